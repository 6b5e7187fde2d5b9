import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import type {ProvisionEvent, Reporter} from '@zstrap/core'
import {StepBoard} from './step-board.js'

const frameIntervalMs = 80

/**
 * Terminal reporter: a live step board redrawn with log-update on stderr.
 * Warnings are printed above the board as they happen; command lines and
 * their output only with `verbose`.
 */
export class InteractiveReporter implements Reporter {
  private readonly verbose: boolean
  private readonly board = new StepBoard()
  private readonly logUpdate = createLogUpdate(process.stderr)
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: ProvisionEvent): void {
    this.board.apply(event)

    switch (event.event) {
      case 'PROVISION_START': {
        console.error(chalk.bold(`\nzstrap: pool ${chalk.cyan(event.poolName)} → ${chalk.cyan(event.target)}\n`))
        this.timer = setInterval(() => {
          this.draw()
        }, frameIntervalMs)
        break
      }

      case 'STEP_WARNING': {
        this.above(chalk.yellow(`  ⚠ ${event.step.displayName}: ${event.message}`))
        break
      }

      case 'COMMAND_STARTED': {
        if (this.verbose) {
          this.above(chalk.gray(`  $ ${event.argv.join(' ')}${event.interactive ? ' (interactive)' : ''}`))
        }

        break
      }

      case 'COMMAND_LOG': {
        if (this.verbose) {
          this.above(event.stream === 'stderr' ? chalk.red(`    ${event.line}`) : `    ${event.line}`)
        }

        break
      }

      case 'PROVISION_FINISHED':
      case 'PROVISION_FAILED': {
        clearInterval(this.timer)
        this.timer = undefined
        this.draw()
        this.logUpdate.done()
        console.error(['', ...this.board.summary(event), ''].join('\n'))
        break
      }

      default: {
        this.draw()
      }
    }
  }

  private above(line: string): void {
    this.logUpdate.clear()
    console.error(line)
    this.draw()
  }

  private draw(): void {
    this.logUpdate(this.board.lines(this.frame++).join('\n'))
  }
}
