import {performance} from 'node:perf_hooks'
import {ExecaCommandExecutor, type CommandExecutor} from './engine/index.js'
import {ExternalCommandError, InteractiveInputError, PipelineError, ZstrapError} from './errors.js'
import {fsPatcher, type Patcher} from './patcher.js'
import {buildPlan} from './plan.js'
import {ConsoleReporter, type Reporter, type StepRef} from './reporter.js'
import {provisionSteps, StepContext, type ProvisionStep, type Sleep} from './steps/index.js'
import type {PipelineState, ProvisionConfig, ProvisionOutcome, ProvisionPlan, StepErrorDetail, StepId, StepResult} from './types.js'

export type ProvisionerOptions = {
  executor?: CommandExecutor;
  patcher?: Patcher;
  reporter?: Reporter;
  /** Override of the step list, mostly for tests */
  steps?: readonly ProvisionStep[];
  sleep?: Sleep;
}

/**
 * Runs the provisioning steps in fixed order against one resolved config
 * snapshot.
 *
 * State machine: pending → running(stepIndex) → succeeded | failed(stepIndex).
 * The first failing step stops the run; nothing is rolled back, and the
 * outcome lists the steps that did complete so a caller can decide on
 * cleanup. A Provisioner runs once.
 */
export class Provisioner {
  readonly config: ProvisionConfig
  private readonly executor: CommandExecutor
  private readonly patcher: Patcher
  private readonly reporter: Reporter
  private readonly steps: readonly ProvisionStep[]
  private readonly sleep?: Sleep
  private current: PipelineState = {status: 'pending'}

  constructor(config: ProvisionConfig, options: ProvisionerOptions = {}) {
    this.config = config
    this.executor = options.executor ?? new ExecaCommandExecutor()
    this.patcher = options.patcher ?? fsPatcher
    this.reporter = options.reporter ?? new ConsoleReporter()
    this.steps = options.steps ?? provisionSteps
    this.sleep = options.sleep
  }

  get state(): PipelineState {
    return this.current
  }

  /**
   * Builds the plan for the given devices and target, then runs every step.
   * Invalid input throws a ValidationError before anything runs; step
   * failures never reject, they are reported in the outcome.
   */
  async run(devices: readonly string[], target: string): Promise<ProvisionOutcome> {
    if (this.current.status !== 'pending') {
      throw new PipelineError(`Provisioner has already run (state: ${this.current.status})`)
    }

    const plan = buildPlan(this.config, devices, target)

    try {
      return await this.execute(plan)
    } finally {
      plan.encryption.passphrase.clear()
    }
  }

  private async execute(plan: ProvisionPlan): Promise<ProvisionOutcome> {
    const startedAt = performance.now()
    const results: StepResult[] = []
    const completedSteps: StepId[] = []

    this.reporter.emit({
      event: 'PROVISION_START',
      poolName: plan.pool.name,
      target: plan.target,
      steps: this.steps.map(stepRef)
    })

    for (const [index, step] of this.steps.entries()) {
      this.current = {status: 'running', stepIndex: index}
      const ref = stepRef(step)
      const context = new StepContext({plan, step: ref, executor: this.executor, patcher: this.patcher, reporter: this.reporter, sleep: this.sleep})

      this.reporter.emit({event: 'STEP_STARTING', step: ref})
      const stepStartedAt = performance.now()

      try {
        const completion = await step.run(context)
        const durationMs = Math.round(performance.now() - stepStartedAt)

        if (completion.status === 'skipped') {
          this.reporter.emit({event: 'STEP_SKIPPED', step: ref, reason: completion.reason})
          results.push({step: step.id, name: step.name, success: true, skipped: true, durationMs})
        } else {
          this.reporter.emit({event: 'STEP_FINISHED', step: ref, durationMs})
          results.push({step: step.id, name: step.name, success: true, durationMs})
        }

        completedSteps.push(step.id)
      } catch (error: unknown) {
        const durationMs = Math.round(performance.now() - stepStartedAt)
        const detail = toErrorDetail(error)

        this.reporter.emit({event: 'STEP_FAILED', step: ref, ...detail, exitCode: exitCodeOf(error)})
        results.push({step: step.id, name: step.name, success: false, error: detail, durationMs})

        this.current = {status: 'failed', stepIndex: index, error: detail}
        this.reporter.emit({event: 'PROVISION_FAILED', step: ref, stepIndex: index, message: detail.message})

        return {
          success: false,
          failedStep: {id: step.id, index, name: step.name},
          error: detail,
          results,
          completedSteps
        }
      }
    }

    this.current = {status: 'succeeded'}
    this.reporter.emit({event: 'PROVISION_FINISHED', durationMs: Math.round(performance.now() - startedAt)})
    return {success: true, results, completedSteps}
  }
}

function stepRef(step: ProvisionStep): StepRef {
  return {id: step.id, displayName: step.name}
}

function toErrorDetail(error: unknown): StepErrorDetail {
  if (error instanceof ZstrapError) {
    return {code: error.code, message: error.message}
  }

  return {
    code: 'UNEXPECTED_ERROR',
    message: error instanceof Error ? error.message : String(error)
  }
}

function exitCodeOf(error: unknown): number | undefined {
  if (error instanceof ExternalCommandError || error instanceof InteractiveInputError) {
    return error.exitCode
  }

  return undefined
}
