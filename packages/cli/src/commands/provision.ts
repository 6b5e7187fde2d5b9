import process from 'node:process'
import type {Command} from 'commander'
import chalk from 'chalk'
import {
  CompositeReporter,
  ConsoleReporter,
  ExecaCommandExecutor,
  Provisioner,
  createDryRun,
  fsPatcher,
  type CommandExecutor,
  type DryRunEntry,
  type Patcher,
  type Reporter,
  type Secret
} from '@zstrap/core'
import {InteractiveReporter} from '../interactive-reporter.js'
import {resolveCommandConfig, type ConfigFlags} from '../config.js'
import {dryRunLines, getGlobalOptions, parseInteger, readPassphraseFile} from '../utils.js'

type ProvisionOptions = ConfigFlags & {
  target: string;
  passphraseFile?: string;
  dryRun?: boolean;
  verbose?: boolean;
  logFile?: string;
}

export function registerProvisionCommand(program: Command): void {
  program
    .command('provision')
    .description('Create a ZFS pool on the given devices and install a bootable system into the target')
    .argument('<devices...>', 'Block devices for the pool, in order')
    .requiredOption('-t, --target <path>', 'Mount root of the system being installed (e.g. /mnt)')
    .option('-c, --config <file>', 'Configuration file (default: .zstrap.yml in the current directory)')
    .option('-p, --pool <name>', 'Pool name')
    .option('--compression <algorithm>', 'Pool compression algorithm')
    .option('--boot-environment <name>', 'Boot environment name')
    .option('--encrypt', 'Create the encrypted dataset')
    .option('--passphrase-file <path>', 'Read the encryption passphrase from the first line of a file')
    .option('--swap-size <gigabytes>', 'Swap volume size in gigabytes', parseInteger)
    .option('--retries <count>', 'Extra attempts for package installs', parseInteger)
    .option('--archzfs-fallback', 'Add the archzfs repository when the ZFS packages cannot be installed')
    .option('--on-missing-anchor <policy>', 'fail or warn when a config file edit finds no anchor')
    .option('--dry-run', 'Print the commands that would run without executing anything')
    .option('--verbose', 'Stream command output (interactive mode)')
    .option('--log-file <path>', 'Also write structured JSON logs to a file')
    .action(async (devices: string[], options: ProvisionOptions, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const passphrase: Secret | undefined = options.passphraseFile === undefined
        ? undefined
        : await readPassphraseFile(options.passphraseFile)
      const config = await resolveCommandConfig(options, {passphrase})

      let executor: CommandExecutor
      let patcher: Patcher
      let dryRunEntries: readonly DryRunEntry[] | undefined
      if (options.dryRun) {
        const dryRun = createDryRun()
        executor = dryRun.executor
        patcher = dryRun.patcher
        dryRunEntries = dryRun.entries
      } else {
        executor = new ExecaCommandExecutor()
        await executor.check()
        patcher = fsPatcher
      }

      const reporters: Reporter[] = [json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})]
      if (options.logFile) {
        reporters.push(new ConsoleReporter({level: 'debug', destination: options.logFile}))
      }

      const reporter = reporters.length === 1 ? reporters[0] : new CompositeReporter(...reporters)
      const provisioner = new Provisioner(config, {executor, patcher, reporter})
      const outcome = await provisioner.run(devices, options.target)

      if (dryRunEntries) {
        printDryRun(dryRunEntries)
      }

      if (json) {
        console.log(JSON.stringify(outcome))
      }

      if (!outcome.success && outcome.failedStep) {
        console.error(chalk.red(`Step ${outcome.failedStep.index + 1} (${outcome.failedStep.id}) failed: ${outcome.error?.message ?? 'unknown error'}`))
        process.exitCode = 1
      }
    })
}

function printDryRun(entries: readonly DryRunEntry[]): void {
  console.log(chalk.bold('\nWould run:'))
  for (const line of dryRunLines(entries)) {
    console.log(`  ${line}`)
  }
}
