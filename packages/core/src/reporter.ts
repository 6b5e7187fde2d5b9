import pino from 'pino'
import type {StepId} from './types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: StepId;
  displayName: string;
}

/**
 * Discriminated union of provisioning events.
 *
 * Lifecycle:
 * 1. PROVISION_START - Pipeline execution begins
 * 2. For each step, in order:
 *    a. STEP_STARTING - Step begins execution
 *    b. COMMAND_STARTED / COMMAND_LOG - External invocations and their output
 *    c. STEP_WARNING - Non-fatal problem (optional package, missing anchor under `warn`)
 *    d. STEP_FINISHED - Step succeeded
 *       OR STEP_SKIPPED - Step had nothing to do
 *       OR STEP_FAILED - Step failed, no further step runs
 * 3. PROVISION_FINISHED - All steps completed successfully
 *    OR PROVISION_FAILED - Pipeline stopped at the first failing step
 *
 * No event ever carries the encryption passphrase.
 */
export type ProvisionStartEvent = {
  event: 'PROVISION_START';
  poolName: string;
  target: string;
  steps: StepRef[];
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  step: StepRef;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  step: StepRef;
  durationMs: number;
}

export type StepSkippedEvent = {
  event: 'STEP_SKIPPED';
  step: StepRef;
  reason: string;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  step: StepRef;
  code: string;
  message: string;
  exitCode?: number;
}

export type StepWarningEvent = {
  event: 'STEP_WARNING';
  step: StepRef;
  message: string;
}

export type CommandStartedEvent = {
  event: 'COMMAND_STARTED';
  step: StepRef;
  argv: readonly string[];
  interactive: boolean;
}

export type CommandLogEvent = {
  event: 'COMMAND_LOG';
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type ProvisionFinishedEvent = {
  event: 'PROVISION_FINISHED';
  durationMs: number;
}

export type ProvisionFailedEvent = {
  event: 'PROVISION_FAILED';
  step: StepRef;
  stepIndex: number;
  message: string;
}

export type ProvisionEvent =
  | ProvisionStartEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepSkippedEvent
  | StepFailedEvent
  | StepWarningEvent
  | CommandStartedEvent
  | CommandLogEvent
  | ProvisionFinishedEvent
  | ProvisionFailedEvent

/**
 * Interface for reporting provisioning events.
 */
export type Reporter = {
  /** Reports pipeline and step state transitions */
  emit(event: ProvisionEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for unattended installs and log collection.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: pino.Level; destination?: string}) {
    const level = options?.level ?? 'info'
    this.logger = options?.destination
      ? pino({level}, pino.destination({dest: options.destination, sync: true}))
      : pino({level})
  }

  emit(event: ProvisionEvent): void {
    switch (event.event) {
      case 'COMMAND_LOG': {
        this.logger.debug(event)
        break
      }

      case 'STEP_WARNING': {
        this.logger.warn(event)
        break
      }

      case 'STEP_FAILED':
      case 'PROVISION_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Delegates emit() to multiple reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: ProvisionEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}
