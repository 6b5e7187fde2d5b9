import {setTimeout} from 'node:timers/promises'
import type {CommandExecutor, CommandResult, OnLogLine} from '../engine/index.js'
import {ConfigPatchError, ExternalCommandError} from '../errors.js'
import {describeMatcher, type Insertion, type Patcher, type PatchResult, type TextMatcher} from '../patcher.js'
import type {Reporter, StepRef} from '../reporter.js'
import type {ProvisionPlan} from '../types.js'

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = async ms => {
  await setTimeout(ms)
}

/**
 * Everything a step may touch: the frozen plan, the executor, the patcher
 * and the reporter, scoped to the step being run.
 */
export class StepContext {
  readonly plan: ProvisionPlan
  readonly step: StepRef
  private readonly executor: CommandExecutor
  private readonly patcher: Patcher
  private readonly reporter: Reporter
  private readonly sleep: Sleep

  constructor({plan, step, executor, patcher, reporter, sleep}: {
    plan: ProvisionPlan;
    step: StepRef;
    executor: CommandExecutor;
    patcher: Patcher;
    reporter: Reporter;
    sleep?: Sleep;
  }) {
    this.plan = plan
    this.step = step
    this.executor = executor
    this.patcher = patcher
    this.reporter = reporter
    this.sleep = sleep ?? defaultSleep
  }

  /**
   * Runs a command and returns its result whatever the exit code.
   */
  async attempt(argv: readonly string[]): Promise<CommandResult> {
    this.reporter.emit({event: 'COMMAND_STARTED', step: this.step, argv, interactive: false})
    return this.executor.run(argv, {onLogLine: this.onLogLine})
  }

  /**
   * Runs a command; a nonzero exit becomes an ExternalCommandError.
   */
  async exec(argv: readonly string[]): Promise<CommandResult> {
    const result = await this.attempt(argv)
    if (result.exitCode !== 0) {
      throw commandFailure(result)
    }

    return result
  }

  /**
   * Runs a command that reads its input from stdin. The input lines are
   * not reported.
   */
  async execInteractive(argv: readonly string[], inputLines: readonly string[]): Promise<CommandResult> {
    this.reporter.emit({event: 'COMMAND_STARTED', step: this.step, argv, interactive: true})
    return this.executor.runInteractive(argv, inputLines, {onLogLine: this.onLogLine})
  }

  /**
   * Runs a command with the package retry policy: up to `retries` extra
   * attempts, the delay doubling after each one. Failures that are not
   * transient are thrown at once.
   */
  async execWithRetries(argv: readonly string[]): Promise<CommandResult> {
    const {retries, retryDelayMs} = this.plan.packages
    let delay = retryDelayMs

    for (let attempt = 0; ; attempt++) {
      const result = await this.attempt(argv)
      if (result.exitCode === 0) {
        return result
      }

      const error = commandFailure(result)
      if (attempt >= retries || !error.transient) {
        throw error
      }

      this.warn(`${error.message} (attempt ${attempt + 1}/${retries + 1}), retrying in ${delay}ms`)
      await this.sleep(delay)
      delay *= 2
    }
  }

  /**
   * `arch-chroot <target> ...args`
   */
  chroot(...args: string[]): string[] {
    return ['arch-chroot', this.plan.target, ...args]
  }

  /**
   * Applies an idempotent file edit. A missing anchor fails the step under
   * the `fail` policy and is reported as a warning under `warn`.
   */
  async patch(filePath: string, anchor: TextMatcher, insertion: Insertion, presenceToken: TextMatcher): Promise<PatchResult> {
    const result = await this.patcher.ensureToken(filePath, anchor, insertion, presenceToken)
    if (result.status === 'anchor-missing') {
      const error = new ConfigPatchError(filePath, describeMatcher(anchor))
      if (this.plan.patching.onMissingAnchor === 'fail') {
        throw error
      }

      this.warn(error.message)
    }

    return result
  }

  async append(filePath: string, block: string, presenceToken: TextMatcher): Promise<PatchResult> {
    return this.patcher.appendIfMissing(filePath, block, presenceToken)
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    await this.patcher.ensureDirectory(dirPath)
  }

  warn(message: string): void {
    this.reporter.emit({event: 'STEP_WARNING', step: this.step, message})
  }

  private readonly onLogLine: OnLogLine = ({stream, line}) => {
    this.reporter.emit({event: 'COMMAND_LOG', step: this.step, stream, line})
  }
}

/**
 * ExternalCommandError for a failed CommandResult.
 */
export function commandFailure(result: CommandResult): ExternalCommandError {
  return new ExternalCommandError(result.argv, result.exitCode, result.error ?? result.stderr, {spawnFailed: result.error !== undefined})
}
