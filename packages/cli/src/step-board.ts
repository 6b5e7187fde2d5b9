import chalk, {type ChalkInstance} from 'chalk'
import {formatDuration, type ProvisionEvent, type ProvisionFailedEvent, type ProvisionFinishedEvent, type StepId, type StepRef} from '@zstrap/core'

type RowStatus = 'pending' | 'running' | 'done' | 'skipped' | 'failed'

type RowColor = 'gray' | 'cyan' | 'green' | 'yellow' | 'red'

type StepRow = {
  position: number;
  step: StepRef;
  status: RowStatus;
  note?: string;
  warnings: string[];
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const rowStyles: Record<RowStatus, {mark: (frame: number) => string; color: RowColor}> = {
  pending: {mark: () => '·', color: 'gray'},
  running: {mark: frame => spinnerFrames[frame % spinnerFrames.length], color: 'cyan'},
  done: {mark: () => '✓', color: 'green'},
  skipped: {mark: () => '-', color: 'gray'},
  failed: {mark: () => '✗', color: 'red'}
}

/** Lines of stderr kept for the command that is running in each step. */
export const stderrTailLength = 20

/**
 * State of the eight-step provisioning run as shown on a terminal: one
 * numbered row per step, its warning count, and the stderr of the last
 * command each step started.
 */
export class StepBoard {
  private readonly rows = new Map<StepId, StepRow>()
  private readonly stderrTails = new Map<StepId, string[]>()

  constructor(private readonly colors: ChalkInstance = chalk) {}

  get warningCount(): number {
    let count = 0
    for (const row of this.rows.values()) {
      count += row.warnings.length
    }

    return count
  }

  apply(event: ProvisionEvent): void {
    switch (event.event) {
      case 'PROVISION_START': {
        for (const step of event.steps) {
          this.rows.set(step.id, {position: this.rows.size + 1, step, status: 'pending', warnings: []})
        }

        break
      }

      case 'STEP_STARTING': {
        this.row(event.step).status = 'running'
        break
      }

      case 'STEP_FINISHED': {
        this.settle(event.step, 'done', formatDuration(event.durationMs))
        this.stderrTails.delete(event.step.id)
        break
      }

      case 'STEP_SKIPPED': {
        this.settle(event.step, 'skipped', event.reason)
        break
      }

      case 'STEP_FAILED': {
        this.settle(event.step, 'failed', event.exitCode === undefined ? event.code : `exit ${event.exitCode}`)
        break
      }

      case 'STEP_WARNING': {
        this.row(event.step).warnings.push(event.message)
        break
      }

      case 'COMMAND_STARTED': {
        this.stderrTails.set(event.step.id, [])
        break
      }

      case 'COMMAND_LOG': {
        if (event.stream === 'stderr') {
          const tail = this.stderrTails.get(event.step.id) ?? []
          tail.push(event.line)
          this.stderrTails.set(event.step.id, tail.slice(-stderrTailLength))
        }

        break
      }

      case 'PROVISION_FINISHED':
      case 'PROVISION_FAILED': {
        break
      }
    }
  }

  /** One line per step, the running one animated by `frame`. */
  lines(frame = 0): string[] {
    const total = this.rows.size
    return [...this.rows.values()].map(row => {
      const style = rowStyles[row.status]
      const paint = this.colors[row.status === 'done' && row.warnings.length > 0 ? 'yellow' : style.color]
      const counter = this.colors.gray(`[${row.position}/${total}]`)
      const note = row.note === undefined ? '' : ` (${row.note})`
      const badge = row.warnings.length > 0 ? this.colors.yellow(` ⚠ ${row.warnings.length}`) : ''
      return `  ${counter} ${paint(style.mark(frame))} ${paint(row.step.displayName + note)}${badge}`
    })
  }

  /** Closing lines: totals on success, the failing command's stderr and the stopping point on failure. */
  summary(event: ProvisionFinishedEvent | ProvisionFailedEvent): string[] {
    const warnings = this.warningCount
    const warningText = warnings === 0 ? '' : `, ${warnings} ${warnings === 1 ? 'warning' : 'warnings'}`

    if (event.event === 'PROVISION_FINISHED') {
      return [this.colors.bold.green(`✓ Provisioned in ${formatDuration(event.durationMs)}${warningText}`)]
    }

    const tail = this.stderrTails.get(event.step.id) ?? []
    const lines = tail.map(line => this.colors.red(`  │ ${line}`))
    lines.push(this.colors.bold.red(`✗ Stopped at step ${event.stepIndex + 1}/${this.rows.size} (${event.step.displayName})${warningText}: ${event.message}`))
    return lines
  }

  private settle(step: StepRef, status: RowStatus, note: string): void {
    const row = this.row(step)
    row.status = status
    row.note = note
  }

  private row(step: StepRef): StepRow {
    let row = this.rows.get(step.id)
    if (!row) {
      row = {position: this.rows.size + 1, step, status: 'pending', warnings: []}
      this.rows.set(step.id, row)
    }

    return row
  }
}
