import process from 'node:process'
import {execa, type Options, type ResultPromise} from 'execa'
import {ToolNotAvailableError} from '../errors.js'
import {CommandExecutor} from './executor.js'
import type {CommandResult, OnLogLine, RunOptions} from './types.js'

/**
 * Build a minimal environment for the child processes.
 * Only PATH, HOME, TERM and locale variables are kept, so that the
 * caller's secrets never reach the volume manager or the chroot.
 */
export function commandEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key === 'TERM' || key === 'LANG' || key.startsWith('LC_'))) {
      env[key] = value
    }
  }

  return env
}

export class ExecaCommandExecutor extends CommandExecutor {
  private readonly env = commandEnv()

  async check(): Promise<void> {
    try {
      await execa('zpool', ['version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new ToolNotAvailableError('zpool', {cause: error})
    }
  }

  async run(argv: readonly string[], options?: RunOptions): Promise<CommandResult> {
    const [file, ...args] = argv
    const startedAt = new Date()
    const proc = execa(file, args, {env: this.env, extendEnv: false, reject: false, stdin: 'ignore'})
    return this.collect(proc, argv, startedAt, options?.onLogLine)
  }

  async runInteractive(argv: readonly string[], inputLines: readonly string[], options?: RunOptions): Promise<CommandResult> {
    const [file, ...args] = argv
    const startedAt = new Date()
    const proc = execa(file, args, {env: this.env, extendEnv: false, reject: false, stdin: 'pipe'})

    // Writes are queued in program order and flushed before stdin closes
    for (const line of inputLines) {
      proc.stdin.write(line)
    }

    proc.stdin.end()

    return this.collect(proc, argv, startedAt, options?.onLogLine)
  }

  private async collect(
    proc: ResultPromise<Options>,
    argv: readonly string[],
    startedAt: Date,
    onLogLine?: OnLogLine
  ): Promise<CommandResult> {
    const stdout: string[] = []
    const stderr: string[] = []

    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        stdout.push(String(line))
        onLogLine?.({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        stderr.push(String(line))
        onLogLine?.({stream: 'stderr', line: String(line)})
      }
    })()

    // With reject:false the result carries the failure; a stream that errors
    // along with it adds nothing
    await Promise.allSettled([stdoutDone, stderrDone])
    const result = await proc

    return {
      argv,
      exitCode: result.exitCode ?? 1,
      stdout: stdout.join('\n'),
      stderr: stderr.join('\n'),
      startedAt,
      finishedAt: new Date(),
      error: result.failed && result.exitCode === undefined ? describeFailure(result) : undefined
    }
  }
}

function describeFailure(result: object): string {
  if ('shortMessage' in result && typeof result.shortMessage === 'string') {
    return result.shortMessage
  }

  return 'Command could not be started'
}
