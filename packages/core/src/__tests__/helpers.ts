import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {CommandExecutor} from '../engine/executor.js'
import type {CommandResult, RunOptions} from '../engine/types.js'
import type {Reporter, ProvisionEvent} from '../reporter.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'zstrap-test-'))
}

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: ProvisionEvent[]} {
  const events: ProvisionEvent[] = []
  const reporter: Reporter = {
    emit(event: ProvisionEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export type ScriptedCall = {
  argv: string[];
  interactive: boolean;
  inputLines: string[];
}

export type ScriptedResponse = {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

/**
 * In-process executor: records every call and answers from a list of
 * rules, first match wins. Unmatched calls succeed.
 */
export class ScriptedExecutor extends CommandExecutor {
  readonly calls: ScriptedCall[] = []
  private readonly rules: Array<{matches: (argv: readonly string[]) => boolean; responses: ScriptedResponse[]}> = []

  /**
   * Answers calls whose command line starts with `prefix`. With several
   * responses, successive calls consume them in order and the last one repeats.
   */
  on(prefix: string[], ...responses: ScriptedResponse[]): this {
    this.rules.push({
      matches: argv => prefix.every((part, index) => argv[index] === part),
      responses
    })
    return this
  }

  fail(prefix: string[], exitCode = 1, stderr = ''): this {
    return this.on(prefix, {exitCode, stderr})
  }

  get argvs(): string[][] {
    return this.calls.map(call => call.argv)
  }

  async check(): Promise<void> {
    // Always available
  }

  async run(argv: readonly string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({argv: [...argv], interactive: false, inputLines: []})
    return this.respond(argv, options)
  }

  async runInteractive(argv: readonly string[], inputLines: readonly string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({argv: [...argv], interactive: true, inputLines: [...inputLines]})
    return this.respond(argv, options)
  }

  private respond(argv: readonly string[], options?: RunOptions): CommandResult {
    const rule = this.rules.find(candidate => candidate.matches(argv))
    const response = rule && rule.responses.length > 1 ? rule.responses.shift() : rule?.responses[0]
    const {exitCode = 0, stdout = '', stderr = ''} = response ?? {}

    for (const line of stdout.split('\n').filter(Boolean)) {
      options?.onLogLine?.({stream: 'stdout', line})
    }

    for (const line of stderr.split('\n').filter(Boolean)) {
      options?.onLogLine?.({stream: 'stderr', line})
    }

    const now = new Date()
    return {argv, exitCode, stdout, stderr, startedAt: now, finishedAt: now}
  }
}

export const noSleep = async (): Promise<void> => {
  // Retries run back to back in tests
}
