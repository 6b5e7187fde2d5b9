export class ZstrapError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ZstrapError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Command errors ----------------------------------------------------------

export class CommandError extends ZstrapError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CommandError'
  }
}

export class ToolNotAvailableError extends CommandError {
  constructor(tool: string, options?: {cause?: unknown}) {
    super('TOOL_NOT_AVAILABLE', `${tool} not found. Please install the ZFS userland tools.`, options)
    this.name = 'ToolNotAvailableError'
  }
}

/**
 * Nonzero exit (or spawn failure) of the volume manager, package manager
 * or bootloader tooling.
 */
export class ExternalCommandError extends CommandError {
  /** True when the program could not be started at all */
  readonly spawnFailed: boolean

  constructor(
    readonly argv: readonly string[],
    readonly exitCode: number,
    readonly stderr = '',
    options?: {cause?: unknown; spawnFailed?: boolean}
  ) {
    super('EXTERNAL_COMMAND_FAILED', formatCommandFailure(argv, exitCode, stderr), options)
    this.name = 'ExternalCommandError'
    this.spawnFailed = options?.spawnFailed ?? false
  }

  /**
   * A missing or non-executable program (exit 126/127, or no process at
   * all) fails the same way on every attempt.
   */
  override get transient(): boolean {
    return !this.spawnFailed && !permanentExitCodes.has(this.exitCode)
  }
}

const permanentExitCodes = new Set([126, 127])

/**
 * Passphrase entry was rejected. The message only names the program,
 * never the input that was written to it.
 */
export class InteractiveInputError extends CommandError {
  constructor(
    readonly argv: readonly string[],
    readonly exitCode: number,
    options?: {cause?: unknown}
  ) {
    super('INTERACTIVE_INPUT_FAILED', `Interactive input to "${argv.join(' ')}" was rejected (exit code ${exitCode})`, options)
    this.name = 'InteractiveInputError'
  }
}

// -- Patch errors ------------------------------------------------------------

export class ConfigPatchError extends ZstrapError {
  constructor(
    readonly filePath: string,
    readonly anchor: string,
    options?: {cause?: unknown}
  ) {
    super('CONFIG_ANCHOR_MISSING', `Anchor ${anchor} not found in ${filePath}, file left unchanged`, options)
    this.name = 'ConfigPatchError'
  }
}

// -- Pipeline errors ---------------------------------------------------------

export class PipelineError extends ZstrapError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PIPELINE_ERROR', message, options)
    this.name = 'PipelineError'
  }
}

export class ValidationError extends ZstrapError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

function formatCommandFailure(argv: readonly string[], exitCode: number, stderr: string): string {
  const lastLine = stderr.trim().split('\n').at(-1)
  const base = `Command "${argv.join(' ')}" failed with exit code ${exitCode}`
  return lastLine ? `${base}: ${lastLine}` : base
}
