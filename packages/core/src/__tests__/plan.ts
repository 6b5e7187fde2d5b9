import test from 'ava'
import {resolveConfig} from '../config.js'
import {ValidationError} from '../errors.js'
import {buildPlan, buildPoolSpec, poolCreateArgs, resolveBootTarget} from '../plan.js'

test('poolCreateArgs emits the fixed property flags, then the pool, then the devices', t => {
  const pool = buildPoolSpec(resolveConfig(), ['/dev/sda', '/dev/sdb'])
  t.deepEqual(poolCreateArgs(pool), [
    'zpool', 'create',
    '-o', 'ashift=12',
    '-o', 'feature@encryption=enabled',
    '-o', 'compression=lz4',
    '-o', 'atime=off',
    '-o', 'relatime=on',
    '-o', 'xattr=sa',
    '-o', 'mountpoint=none',
    'rpool',
    '/dev/sda',
    '/dev/sdb'
  ])
})

test('poolCreateArgs is deterministic for a fixed pool name and compression', t => {
  const config = resolveConfig({poolName: 'tank', compression: 'zstd'})
  const first = poolCreateArgs(buildPoolSpec(config, ['/dev/nvme0n1p2']))
  const second = poolCreateArgs(buildPoolSpec(config, ['/dev/nvme0n1p2']))
  t.deepEqual(first, second)
  t.true(first.includes('compression=zstd'))
  t.is(first.at(-2), 'tank')
})

test('devices keep their input order', t => {
  const pool = buildPoolSpec(resolveConfig(), ['/dev/sdc', '/dev/sda', '/dev/sdb'])
  t.deepEqual(poolCreateArgs(pool).slice(-3), ['/dev/sdc', '/dev/sda', '/dev/sdb'])
})

test('buildPoolSpec requires at least one device', t => {
  t.throws(() => buildPoolSpec(resolveConfig(), []), {instanceOf: ValidationError})
})

test('buildPoolSpec rejects relative device paths', t => {
  t.throws(() => buildPoolSpec(resolveConfig(), ['sda']), {
    instanceOf: ValidationError,
    message: 'Device path must be absolute, got "sda"'
  })
})

test('buildPoolSpec rejects a device listed twice', t => {
  t.throws(() => buildPoolSpec(resolveConfig(), ['/dev/sda', '/dev/sda']), {
    instanceOf: ValidationError,
    message: 'Device /dev/sda is listed more than once'
  })
})

test('resolveBootTarget strips a trailing slash', t => {
  t.is(resolveBootTarget('/mnt/'), '/mnt')
  t.is(resolveBootTarget('/mnt/install'), '/mnt/install')
})

test('resolveBootTarget rejects relative paths and the system root', t => {
  t.throws(() => resolveBootTarget('mnt'), {instanceOf: ValidationError})
  t.throws(() => resolveBootTarget('/'), {instanceOf: ValidationError})
})

test('buildPlan derives the boot dataset and swap device from the pool', t => {
  const plan = buildPlan(resolveConfig({poolName: 'tank', bootEnvironment: 'arch', swap: {sizeGb: 8}}), ['/dev/sda'], '/mnt')
  t.is(plan.bootDataset, 'tank/ROOT/arch')
  t.is(plan.target, '/mnt')
  t.deepEqual(plan.swap, {sizeGb: 8, blockSize: '4K', device: '/dev/zvol/tank/swap/swapfile'})
  t.is(plan.encryption.cipher, 'aes-256-gcm')
  t.is(plan.encryption.keyFormat, 'passphrase')
  t.is(plan.encryption.dataset.name, 'tank/encrypted')
  t.like(plan.encryption.dataset.properties, {
    encryption: plan.encryption.cipher,
    keyformat: plan.encryption.keyFormat,
    keylocation: plan.encryption.keyLocation
  })
  t.true(Object.isFrozen(plan))
})
