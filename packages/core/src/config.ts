import {ValidationError} from './errors.js'
import {Secret} from './secret.js'
import type {MissingAnchorPolicy, ProvisionConfig, ProvisionConfigInput} from './types.js'

export const defaultConfig = {
  poolName: 'rpool',
  compression: 'lz4',
  bootEnvironment: 'default',
  swapSizeGb: 4,
  retries: 0,
  retryDelayMs: 5000,
  archzfsFallback: false,
  bootloaderTarget: 'x86_64-efi',
  efiDirectory: '/boot',
  bootloaderId: 'GRUB',
  onMissingAnchor: 'fail'
} as const

const poolNamePattern = /^[A-Za-z][\w.:-]*$/
const reservedPoolNames = new Set(['mirror', 'raidz', 'draid', 'spare', 'log', 'cache', 'special', 'dedup'])
const componentPattern = /^[\w.:-]+$/
const compressionPattern = /^(?:on|off|lz4|lzjb|zle|gzip(?:-[1-9])?|zstd(?:-(?:[1-9]|1\d))?|zstd-fast(?:-\d+)?)$/

/**
 * Merges layered config inputs (later wins) over the defaults, validates
 * the result and returns a frozen snapshot.
 */
export function resolveConfig(...inputs: ProvisionConfigInput[]): ProvisionConfig {
  const poolName = pick(inputs, i => i.poolName) ?? defaultConfig.poolName
  validatePoolName(poolName)

  const bootEnvironment = pick(inputs, i => i.bootEnvironment) ?? defaultConfig.bootEnvironment
  if (!componentPattern.test(bootEnvironment) || bootEnvironment === '.' || bootEnvironment === '..') {
    throw new ValidationError(`Invalid boot environment name "${bootEnvironment}"`)
  }

  const compression = pick(inputs, i => i.compression) ?? defaultConfig.compression
  if (!compressionPattern.test(compression)) {
    throw new ValidationError(`Unsupported compression algorithm "${compression}"`)
  }

  const sizeGb = pick(inputs, i => i.swap?.sizeGb) ?? defaultConfig.swapSizeGb
  if (!Number.isInteger(sizeGb) || sizeGb < 1) {
    throw new ValidationError(`Swap size must be a positive whole number of gigabytes, got ${sizeGb}`)
  }

  const retries = pick(inputs, i => i.packages?.retries) ?? defaultConfig.retries
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ValidationError(`packages.retries must be a non-negative integer, got ${retries}`)
  }

  const retryDelayMs = pick(inputs, i => i.packages?.retryDelayMs) ?? defaultConfig.retryDelayMs
  if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
    throw new ValidationError(`packages.retryDelayMs must be a non-negative number, got ${retryDelayMs}`)
  }

  const onMissingAnchor: unknown = pick(inputs, i => i.patching?.onMissingAnchor) ?? defaultConfig.onMissingAnchor
  if (!isMissingAnchorPolicy(onMissingAnchor)) {
    throw new ValidationError(`patching.onMissingAnchor must be "fail" or "warn", got "${String(onMissingAnchor)}"`)
  }

  const efiDirectory = pick(inputs, i => i.bootloader?.efiDirectory) ?? defaultConfig.efiDirectory
  if (!efiDirectory.startsWith('/')) {
    throw new ValidationError(`bootloader.efiDirectory must be an absolute path, got "${efiDirectory}"`)
  }

  const passphrase = pick(inputs, i => i.encryption?.passphrase)
  return Object.freeze({
    poolName,
    compression,
    bootEnvironment,
    encryption: Object.freeze({
      enabled: pick(inputs, i => i.encryption?.enabled) ?? false,
      passphrase: passphrase instanceof Secret ? passphrase : new Secret(passphrase ?? '')
    }),
    swap: Object.freeze({sizeGb}),
    packages: Object.freeze({
      retries,
      retryDelayMs,
      archzfsFallback: pick(inputs, i => i.packages?.archzfsFallback) ?? defaultConfig.archzfsFallback
    }),
    bootloader: Object.freeze({
      target: pick(inputs, i => i.bootloader?.target) ?? defaultConfig.bootloaderTarget,
      efiDirectory,
      bootloaderId: pick(inputs, i => i.bootloader?.bootloaderId) ?? defaultConfig.bootloaderId
    }),
    patching: Object.freeze({onMissingAnchor})
  })
}

export function validatePoolName(name: string): void {
  if (name.length === 0) {
    throw new ValidationError('Pool name must not be empty')
  }

  if (!poolNamePattern.test(name)) {
    throw new ValidationError(`Invalid pool name "${name}": must start with a letter and contain only letters, digits, "_", "-", ".", ":"`)
  }

  if (reservedPoolNames.has(name) || /^c\d/.test(name) || /^(?:mirror|raidz|draid|spare)/.test(name)) {
    throw new ValidationError(`Pool name "${name}" is reserved`)
  }
}

function isMissingAnchorPolicy(value: unknown): value is MissingAnchorPolicy {
  return value === 'fail' || value === 'warn'
}

/**
 * Last defined value across the layered inputs.
 */
function pick<T>(inputs: ProvisionConfigInput[], get: (input: ProvisionConfigInput) => T | undefined): T | undefined {
  let value: T | undefined
  for (const input of inputs) {
    const candidate = get(input)
    if (candidate !== undefined) {
      value = candidate
    }
  }

  return value
}
