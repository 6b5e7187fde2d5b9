import type {CommandResult, RunOptions} from './types.js'

/**
 * Abstract interface for running external programs.
 *
 * Implementations:
 * - `ExecaCommandExecutor`: spawns real processes through execa
 * - `RecordingExecutor`: records invocations without running them (dry runs)
 *
 * Calls are blocking from the caller's point of view and never retried.
 * Every side effect of a command is irreversible as far as the executor
 * is concerned.
 */
export abstract class CommandExecutor {
  /**
   * Verifies that the volume manager tools are installed.
   * @throws ToolNotAvailableError if they are not reachable
   */
  abstract check(): Promise<void>

  /**
   * Runs a program with an argument vector and waits for it to exit.
   * A nonzero exit is reported through `exitCode`, never thrown.
   */
  abstract run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>

  /**
   * Starts a program, writes each entry of `inputLines` verbatim to its
   * stdin in order, closes stdin and waits for it to exit.
   * Entries carry their own line terminator.
   */
  abstract runInteractive(argv: readonly string[], inputLines: readonly string[], options?: RunOptions): Promise<CommandResult>
}
