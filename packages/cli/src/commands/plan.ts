import type {Command} from 'commander'
import chalk from 'chalk'
import {
  buildPoolSpec,
  datasetCreateArgs,
  planDatasets,
  planEncryptedDataset,
  poolCreateArgs,
  type DatasetSpec,
  type ProvisionConfig
} from '@zstrap/core'
import {resolveCommandConfig, type ConfigFlags} from '../config.js'
import {formatCommand, getGlobalOptions} from '../utils.js'

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show the pool and dataset layout without running anything')
    .argument('[devices...]', 'Block devices for the pool, in order')
    .option('-c, --config <file>', 'Configuration file (default: .zstrap.yml in the current directory)')
    .option('-p, --pool <name>', 'Pool name')
    .option('--compression <algorithm>', 'Pool compression algorithm')
    .option('--boot-environment <name>', 'Boot environment name')
    .option('--encrypt', 'Include the encrypted dataset')
    .action(async (devices: string[], options: ConfigFlags, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const config = await resolveCommandConfig(options)
      const datasets = plannedDatasets(config)
      const pool = devices.length > 0 ? poolCreateArgs(buildPoolSpec(config, devices)) : undefined

      if (json) {
        console.log(JSON.stringify({pool, datasets: datasets.map(dataset => datasetCreateArgs(dataset))}))
        return
      }

      if (pool) {
        console.log(chalk.bold('Pool:'))
        console.log(`  ${formatCommand(pool)}\n`)
      }

      console.log(chalk.bold('Datasets:'))
      for (const line of datasetTable(datasets)) {
        console.log(`  ${line}`)
      }
    })
}

/**
 * Datasets in creation order, the encrypted one last when enabled.
 */
export function plannedDatasets(config: ProvisionConfig): DatasetSpec[] {
  const datasets = [...planDatasets({
    poolName: config.poolName,
    bootEnvironment: config.bootEnvironment,
    compression: config.compression,
    swap: config.swap
  })]

  if (config.encryption.enabled) {
    datasets.push(planEncryptedDataset(config.poolName))
  }

  return datasets
}

/**
 * Column-aligned NAME / MOUNTPOINT / MOUNT / GROUP rows with a header.
 */
export function datasetTable(datasets: readonly DatasetSpec[]): string[] {
  const rows = [
    ['NAME', 'MOUNTPOINT', 'MOUNT', 'GROUP'],
    ...datasets.map(dataset => [
      dataset.kind === 'volume' ? `${dataset.name} (${dataset.volume?.size ?? '?'})` : dataset.name,
      dataset.mountpoint,
      dataset.mount,
      dataset.group
    ])
  ]

  const widths = rows[0].map((_, column) => Math.max(...rows.map(row => row[column].length)))
  return rows.map(row => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd())
}
