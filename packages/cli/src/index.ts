#!/usr/bin/env -S node --import tsx
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {ZstrapError} from '@zstrap/core'
import {registerProvisionCommand} from './commands/provision.js'
import {registerPlanCommand} from './commands/plan.js'

async function main() {
  const program = new Command()

  program
    .name('zstrap')
    .description('Provision a ZFS root pool and a bootable Arch Linux install on it')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')

  registerProvisionCommand(program)
  registerPlanCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof ZstrapError) {
    console.error(chalk.red(`${error.code}: ${error.message}`))
  } else {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : error)
  }

  process.exitCode = 1
}
