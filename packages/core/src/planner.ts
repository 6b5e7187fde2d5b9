import {ValidationError} from './errors.js'
import type {DatasetSpec, SwapConfig} from './types.js'

export const swapBlockSize = '4K'

export type HierarchyOptions = {
  poolName: string;
  bootEnvironment: string;
  compression: string;
  swap: SwapConfig;
}

export function bootDatasetName(poolName: string, bootEnvironment: string): string {
  return `${poolName}/ROOT/${bootEnvironment}`
}

export function swapDevicePath(poolName: string): string {
  return `/dev/zvol/${poolName}/swap/swapfile`
}

/**
 * Computes the fixed dataset tree for a pool, in creation order.
 *
 * Parents always precede their children. The `swap` group is a direct
 * child of the pool and is materialized separately from the `system` group.
 */
export function planDatasets({poolName, bootEnvironment, compression, swap}: HierarchyOptions): readonly DatasetSpec[] {
  const datasets: DatasetSpec[] = [
    filesystem(poolName, 'ROOT', 'none', {}, 'never'),
    filesystem(`${poolName}/ROOT`, bootEnvironment, '/', {canmount: 'noauto', compression}, 'explicit'),
    filesystem(poolName, 'home', '/home'),
    filesystem(poolName, 'var', '/var'),
    filesystem(`${poolName}/var`, 'lib', '/var/lib'),
    filesystem(`${poolName}/var`, 'log', '/var/log'),
    {
      ...filesystem(poolName, 'swap', 'none', {
        compression: 'zle',
        logbias: 'throughput',
        sync: 'always',
        primarycache: 'metadata',
        secondarycache: 'none',
        'com.sun:auto-snapshot': 'false'
      }, 'never'),
      group: 'swap'
    },
    {
      name: `${poolName}/swap/swapfile`,
      parent: `${poolName}/swap`,
      kind: 'volume',
      mountpoint: 'none',
      properties: Object.freeze({}),
      volume: Object.freeze({size: `${swap.sizeGb}G`, blockSize: swapBlockSize}),
      group: 'swap',
      mount: 'never'
    }
  ]

  return Object.freeze(datasets.map(dataset => Object.freeze(dataset)))
}

export type EncryptionKeyOptions = {
  cipher: string;
  keyFormat: string;
  keyLocation: string;
}

/** Native encryption keyed by a passphrase read from the tool's prompt. */
export const passphraseEncryption: Readonly<EncryptionKeyOptions> = Object.freeze({
  cipher: 'aes-256-gcm',
  keyFormat: 'passphrase',
  keyLocation: 'prompt'
})

/**
 * Dataset created by the encryption step; its encryption properties come
 * from the key options.
 */
export function planEncryptedDataset(poolName: string, {cipher, keyFormat, keyLocation}: EncryptionKeyOptions = passphraseEncryption): DatasetSpec {
  return Object.freeze(filesystem(poolName, 'encrypted', '/encrypted', {
    encryption: cipher,
    keyformat: keyFormat,
    keylocation: keyLocation
  }))
}

/**
 * `zfs create` argument vector for a dataset.
 * Volumes get `-V <size> -b <block size>`, filesystems their mountpoint,
 * then every property in declaration order, then the name.
 */
export function datasetCreateArgs(dataset: DatasetSpec): string[] {
  const args = ['zfs', 'create']

  if (dataset.kind === 'volume') {
    if (!dataset.volume) {
      throw new ValidationError(`Volume ${dataset.name} has no size`)
    }

    args.push('-V', dataset.volume.size, '-b', dataset.volume.blockSize)
  } else {
    args.push('-o', `mountpoint=${dataset.mountpoint}`)
  }

  for (const [key, value] of Object.entries(dataset.properties)) {
    args.push('-o', `${key}=${value}`)
  }

  args.push(dataset.name)
  return args
}

/**
 * Checks the invariants a planned hierarchy must hold before anything
 * is created from it.
 */
export function validateHierarchy(datasets: readonly DatasetSpec[], poolName: string): void {
  if (poolName.length === 0) {
    throw new ValidationError('Pool name must not be empty')
  }

  const created = new Set<string>([poolName])
  for (const dataset of datasets) {
    if (!dataset.name.startsWith(`${poolName}/`)) {
      throw new ValidationError(`Dataset ${dataset.name} is not rooted at pool ${poolName}`)
    }

    const leaf = dataset.name.slice(dataset.parent.length + 1)
    if (!dataset.name.startsWith(`${dataset.parent}/`) || leaf.length === 0 || leaf.includes('/')) {
      throw new ValidationError(`Dataset ${dataset.name} is not a direct child of ${dataset.parent}`)
    }

    if (!created.has(dataset.parent)) {
      throw new ValidationError(`Dataset ${dataset.name} is planned before its parent ${dataset.parent}`)
    }

    if (dataset.mountpoint !== 'none' && !dataset.mountpoint.startsWith('/')) {
      throw new ValidationError(`Dataset ${dataset.name} has a relative mountpoint "${dataset.mountpoint}"`)
    }

    if (dataset.group === 'swap' && !dataset.name.startsWith(`${poolName}/swap`)) {
      throw new ValidationError(`Swap dataset ${dataset.name} must live under ${poolName}/swap`)
    }

    created.add(dataset.name)
  }

  const swapRoot = datasets.find(dataset => dataset.group === 'swap' && dataset.kind === 'filesystem')
  if (swapRoot && swapRoot.parent !== poolName) {
    throw new ValidationError(`Swap dataset ${swapRoot.name} must be a direct child of the pool`)
  }
}

function filesystem(
  parent: string,
  leaf: string,
  mountpoint: string,
  properties: Record<string, string> = {},
  mount: DatasetSpec['mount'] = 'auto'
): DatasetSpec {
  return {
    name: `${parent}/${leaf}`,
    parent,
    kind: 'filesystem',
    mountpoint,
    properties: Object.freeze(properties),
    group: 'system',
    mount
  }
}
