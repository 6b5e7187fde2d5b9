import test from 'ava'
import {resolveConfig} from '@zstrap/core'
import {datasetTable, plannedDatasets} from '../commands/plan.js'

test('plannedDatasets lists the hierarchy in creation order', t => {
  const datasets = plannedDatasets(resolveConfig({}))
  t.deepEqual(datasets.map(dataset => dataset.name), [
    'rpool/ROOT',
    'rpool/ROOT/default',
    'rpool/home',
    'rpool/var',
    'rpool/var/lib',
    'rpool/var/log',
    'rpool/swap',
    'rpool/swap/swapfile'
  ])
})

test('plannedDatasets appends the encrypted dataset when enabled', t => {
  const datasets = plannedDatasets(resolveConfig({poolName: 'tank', encryption: {enabled: true}}))
  t.is(datasets.length, 9)
  t.is(datasets.at(-1)?.name, 'tank/encrypted')
})

test('datasetTable aligns columns under a header', t => {
  const rows = datasetTable(plannedDatasets(resolveConfig({})))

  t.is(rows.length, 9)
  t.is(rows[0], 'NAME' + ' '.repeat(22) + 'MOUNTPOINT  MOUNT     GROUP')
  t.is(rows[2], 'rpool/ROOT/default' + ' '.repeat(8) + '/' + ' '.repeat(11) + 'explicit' + ' '.repeat(2) + 'system')
  t.is(rows[8], 'rpool/swap/swapfile (4G)' + ' '.repeat(2) + 'none' + ' '.repeat(8) + 'never' + ' '.repeat(5) + 'swap')
})
