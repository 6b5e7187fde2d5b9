import {isAbsolute, normalize} from 'node:path'
import {ValidationError} from './errors.js'
import {bootDatasetName, passphraseEncryption, planDatasets, planEncryptedDataset, swapBlockSize, swapDevicePath, validateHierarchy} from './planner.js'
import type {BootTarget, PoolSpec, ProvisionConfig, ProvisionPlan} from './types.js'

export const poolAshift = 12

export function buildPoolSpec(config: ProvisionConfig, devices: readonly string[]): PoolSpec {
  if (devices.length === 0) {
    throw new ValidationError('At least one device is required to create a pool')
  }

  for (const device of devices) {
    if (!isAbsolute(device)) {
      throw new ValidationError(`Device path must be absolute, got "${device}"`)
    }
  }

  const duplicate = devices.find((device, index) => devices.indexOf(device) !== index)
  if (duplicate) {
    throw new ValidationError(`Device ${duplicate} is listed more than once`)
  }

  return Object.freeze({
    name: config.poolName,
    devices: Object.freeze([...devices]),
    ashift: poolAshift,
    features: Object.freeze({encryption: 'enabled'}),
    properties: Object.freeze({
      compression: config.compression,
      atime: 'off',
      relatime: 'on',
      xattr: 'sa',
      mountpoint: 'none'
    })
  })
}

/**
 * `zpool create` argument vector: fixed property flags, the pool name,
 * then every device in input order.
 */
export function poolCreateArgs(pool: PoolSpec): string[] {
  const args = ['zpool', 'create', '-o', `ashift=${pool.ashift}`]

  for (const [feature, state] of Object.entries(pool.features)) {
    args.push('-o', `feature@${feature}=${state}`)
  }

  for (const [key, value] of Object.entries(pool.properties)) {
    args.push('-o', `${key}=${value}`)
  }

  args.push(pool.name, ...pool.devices)
  return args
}

export function resolveBootTarget(target: string): BootTarget {
  if (!isAbsolute(target)) {
    throw new ValidationError(`Install target must be an absolute path, got "${target}"`)
  }

  const normalized = normalize(target)
  if (normalized === '/') {
    throw new ValidationError('Install target must not be the running system root')
  }

  return normalized.endsWith('/') ? normalized.slice(0, -1) : normalized
}

/**
 * Builds every spec the pipeline needs from a resolved config snapshot.
 * Called once, before the first step runs.
 */
export function buildPlan(config: ProvisionConfig, devices: readonly string[], target: string): ProvisionPlan {
  const pool = buildPoolSpec(config, devices)
  const datasets = planDatasets({
    poolName: config.poolName,
    bootEnvironment: config.bootEnvironment,
    compression: config.compression,
    swap: config.swap
  })
  validateHierarchy(datasets, config.poolName)

  const {cipher, keyFormat, keyLocation} = passphraseEncryption

  return Object.freeze({
    pool,
    datasets,
    encryption: Object.freeze({
      enabled: config.encryption.enabled,
      passphrase: config.encryption.passphrase,
      cipher,
      keyFormat,
      keyLocation,
      dataset: planEncryptedDataset(config.poolName, {cipher, keyFormat, keyLocation})
    }),
    swap: Object.freeze({
      sizeGb: config.swap.sizeGb,
      blockSize: swapBlockSize,
      device: swapDevicePath(config.poolName)
    }),
    target: resolveBootTarget(target),
    bootDataset: bootDatasetName(config.poolName, config.bootEnvironment),
    packages: config.packages,
    bootloader: config.bootloader,
    patching: config.patching
  })
}
