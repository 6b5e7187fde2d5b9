import test from 'ava'
import {ValidationError} from '../errors.js'
import {datasetCreateArgs, planDatasets, planEncryptedDataset, validateHierarchy} from '../planner.js'
import type {DatasetSpec} from '../types.js'

function plan(overrides?: {poolName?: string; bootEnvironment?: string; compression?: string; sizeGb?: number}): readonly DatasetSpec[] {
  return planDatasets({
    poolName: overrides?.poolName ?? 'rpool',
    bootEnvironment: overrides?.bootEnvironment ?? 'default',
    compression: overrides?.compression ?? 'lz4',
    swap: {sizeGb: overrides?.sizeGb ?? 4}
  })
}

function find(datasets: readonly DatasetSpec[], name: string): DatasetSpec {
  const dataset = datasets.find(d => d.name === name)
  if (!dataset) {
    throw new Error(`Dataset ${name} not planned`)
  }

  return dataset
}

// -- topology ----------------------------------------------------------------

test('planDatasets returns the fixed tree in creation order', t => {
  t.deepEqual(plan().map(d => d.name), [
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

test('ROOT comes before the boot environment and swap before swapfile', t => {
  const names = plan({poolName: 'tank', bootEnvironment: 'arch'}).map(d => d.name)
  t.true(names.indexOf('tank/ROOT') < names.indexOf('tank/ROOT/arch'))
  t.true(names.indexOf('tank/swap') < names.indexOf('tank/swap/swapfile'))
})

test('every dataset path is rooted at the pool', t => {
  for (const dataset of plan({poolName: 'tank'})) {
    t.true(dataset.name.startsWith('tank/'))
  }
})

test('ROOT is a container with mountpoint none', t => {
  const root = find(plan(), 'rpool/ROOT')
  t.is(root.mountpoint, 'none')
  t.is(root.mount, 'never')
  t.deepEqual(root.properties, {})
})

test('boot environment mounts at / with canmount=noauto and the chosen compression', t => {
  const be = find(plan({compression: 'zstd'}), 'rpool/ROOT/default')
  t.is(be.mountpoint, '/')
  t.is(be.mount, 'explicit')
  t.deepEqual(be.properties, {canmount: 'noauto', compression: 'zstd'})
})

test('common datasets map to their mountpoints', t => {
  const datasets = plan()
  t.is(find(datasets, 'rpool/home').mountpoint, '/home')
  t.is(find(datasets, 'rpool/var').mountpoint, '/var')
  t.is(find(datasets, 'rpool/var/lib').mountpoint, '/var/lib')
  t.is(find(datasets, 'rpool/var/log').mountpoint, '/var/log')
})

test('every mountpoint is absolute or none', t => {
  for (const dataset of plan()) {
    t.true(dataset.mountpoint === 'none' || dataset.mountpoint.startsWith('/'))
  }
})

test('swap is a direct child of the pool', t => {
  const swap = find(plan(), 'rpool/swap')
  t.is(swap.parent, 'rpool')
  t.is(swap.group, 'swap')
})

test('swapfile is a volume of the configured size with 4K blocks', t => {
  const swapfile = find(plan({sizeGb: 8}), 'rpool/swap/swapfile')
  t.is(swapfile.kind, 'volume')
  t.deepEqual(swapfile.volume, {size: '8G', blockSize: '4K'})
})

test('the plan is frozen', t => {
  const datasets = plan()
  t.true(Object.isFrozen(datasets))
  t.true(Object.isFrozen(datasets[1]))
  t.true(Object.isFrozen(datasets[1].properties))
})

// -- create arguments --------------------------------------------------------

test('datasetCreateArgs for the boot environment', t => {
  t.deepEqual(datasetCreateArgs(find(plan(), 'rpool/ROOT/default')), [
    'zfs', 'create', '-o', 'mountpoint=/', '-o', 'canmount=noauto', '-o', 'compression=lz4', 'rpool/ROOT/default'
  ])
})

test('datasetCreateArgs for the swap container', t => {
  t.deepEqual(datasetCreateArgs(find(plan(), 'rpool/swap')), [
    'zfs', 'create',
    '-o', 'mountpoint=none',
    '-o', 'compression=zle',
    '-o', 'logbias=throughput',
    '-o', 'sync=always',
    '-o', 'primarycache=metadata',
    '-o', 'secondarycache=none',
    '-o', 'com.sun:auto-snapshot=false',
    'rpool/swap'
  ])
})

test('datasetCreateArgs for the swap volume', t => {
  t.deepEqual(datasetCreateArgs(find(plan({sizeGb: 8}), 'rpool/swap/swapfile')), [
    'zfs', 'create', '-V', '8G', '-b', '4K', 'rpool/swap/swapfile'
  ])
})

test('planEncryptedDataset uses a prompted passphrase key', t => {
  t.deepEqual(datasetCreateArgs(planEncryptedDataset('rpool')), [
    'zfs', 'create',
    '-o', 'mountpoint=/encrypted',
    '-o', 'encryption=aes-256-gcm',
    '-o', 'keyformat=passphrase',
    '-o', 'keylocation=prompt',
    'rpool/encrypted'
  ])
})

test('planEncryptedDataset takes its properties from the key options', t => {
  const dataset = planEncryptedDataset('tank', {cipher: 'aes-128-ccm', keyFormat: 'hex', keyLocation: 'file:///etc/zfs/tank.key'})
  t.is(dataset.mountpoint, '/encrypted')
  t.deepEqual(dataset.properties, {
    encryption: 'aes-128-ccm',
    keyformat: 'hex',
    keylocation: 'file:///etc/zfs/tank.key'
  })
})

// -- validation --------------------------------------------------------------

test('validateHierarchy accepts the planned tree', t => {
  t.notThrows(() => {
    validateHierarchy(plan(), 'rpool')
  })
})

test('validateHierarchy rejects a child planned before its parent', t => {
  const [root, be, ...rest] = plan()
  const error = t.throws(() => {
    validateHierarchy([be, root, ...rest], 'rpool')
  }, {instanceOf: ValidationError})
  t.is(error?.message, 'Dataset rpool/ROOT/default is planned before its parent rpool/ROOT')
})

test('validateHierarchy rejects datasets of another pool', t => {
  t.throws(() => {
    validateHierarchy(plan({poolName: 'tank'}), 'rpool')
  }, {instanceOf: ValidationError, message: 'Dataset tank/ROOT is not rooted at pool rpool'})
})

test('validateHierarchy rejects a relative mountpoint', t => {
  const datasets = plan().map(d => d.name === 'rpool/home' ? {...d, mountpoint: 'home'} : d)
  t.throws(() => {
    validateHierarchy(datasets, 'rpool')
  }, {instanceOf: ValidationError, message: 'Dataset rpool/home has a relative mountpoint "home"'})
})
