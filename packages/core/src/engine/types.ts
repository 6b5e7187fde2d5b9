/**
 * Log line from a running command.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving output lines while a command runs.
 */
export type OnLogLine = (log: LogLine) => void

export type RunOptions = {
  /** Real-time stdout/stderr lines */
  onLogLine?: OnLogLine;
}

/**
 * Result of a command execution. A nonzero exit code is a failure value,
 * not an exception.
 */
export type CommandResult = {
  /** Program and arguments as invoked */
  argv: readonly string[];
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Captured stdout */
  stdout: string;
  /** Captured stderr */
  stderr: string;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
  /** Set when the program could not be started or was killed */
  error?: string;
}
