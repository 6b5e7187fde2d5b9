import type {DryRunEntry} from '../dry-run.js'
import {CommandExecutor} from './executor.js'
import type {CommandResult, RunOptions} from './types.js'

export type RecordedCommand = {
  argv: readonly string[];
  interactive: boolean;
  /** Number of lines written to stdin; their content is never kept */
  inputLineCount: number;
}

/**
 * Executor that records invocations and reports success without running
 * anything. Backs dry runs.
 */
export class RecordingExecutor extends CommandExecutor {
  readonly commands: RecordedCommand[] = []

  constructor(private readonly log?: DryRunEntry[]) {
    super()
  }

  async check(): Promise<void> {
    // Nothing to check
  }

  async run(argv: readonly string[], _options?: RunOptions): Promise<CommandResult> {
    this.record({argv: [...argv], interactive: false, inputLineCount: 0})
    return succeeded(argv)
  }

  async runInteractive(argv: readonly string[], inputLines: readonly string[], _options?: RunOptions): Promise<CommandResult> {
    this.record({argv: [...argv], interactive: true, inputLineCount: inputLines.length})
    return succeeded(argv)
  }

  private record(command: RecordedCommand): void {
    this.commands.push(command)
    this.log?.push({kind: 'command', command})
  }
}

function succeeded(argv: readonly string[]): CommandResult {
  const now = new Date()
  return {argv, exitCode: 0, stdout: '', stderr: '', startedAt: now, finishedAt: now}
}
