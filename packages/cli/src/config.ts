import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {resolveConfig, Secret, ValidationError, type MissingAnchorPolicy, type ProvisionConfig, type ProvisionConfigInput} from '@zstrap/core'

export const configFilename = '.zstrap.yml'

/**
 * Loads the project-level `.zstrap.yml` configuration from a directory, or
 * the given file. Returns an empty config when the default file does not
 * exist; an explicit file must exist.
 */
export async function loadConfig(dir: string, file?: string): Promise<ProvisionConfigInput> {
  const filePath = file ?? join(dir, configFilename)
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    if (file === undefined && isErrnoException(error) && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  return parseConfigInput(parsed, filePath)
}

/**
 * Checks the shape of a parsed config document. Unknown keys are rejected so
 * that a typo does not silently fall back to a default.
 */
export function parseConfigInput(value: unknown, source: string): ProvisionConfigInput {
  const root = section(value, source, '', ['poolName', 'compression', 'bootEnvironment', 'encryption', 'swap', 'packages', 'bootloader', 'patching'])
  const input: ProvisionConfigInput = {
    poolName: optionalString(root, source, 'poolName'),
    compression: optionalString(root, source, 'compression'),
    bootEnvironment: optionalString(root, source, 'bootEnvironment')
  }

  if (root.encryption !== undefined) {
    const encryption = section(root.encryption, source, 'encryption', ['enabled', 'passphrase'])
    if (encryption.passphrase !== undefined) {
      throw new ValidationError(`${source}: encryption.passphrase is not read from config files, use ZSTRAP_PASSPHRASE or --passphrase-file`)
    }

    input.encryption = {enabled: optionalBoolean(encryption, source, 'encryption.enabled')}
  }

  if (root.swap !== undefined) {
    const swap = section(root.swap, source, 'swap', ['sizeGb'])
    input.swap = {sizeGb: optionalNumber(swap, source, 'swap.sizeGb')}
  }

  if (root.packages !== undefined) {
    const packages = section(root.packages, source, 'packages', ['retries', 'retryDelayMs', 'archzfsFallback'])
    input.packages = {
      retries: optionalNumber(packages, source, 'packages.retries'),
      retryDelayMs: optionalNumber(packages, source, 'packages.retryDelayMs'),
      archzfsFallback: optionalBoolean(packages, source, 'packages.archzfsFallback')
    }
  }

  if (root.bootloader !== undefined) {
    const bootloader = section(root.bootloader, source, 'bootloader', ['target', 'efiDirectory', 'bootloaderId'])
    input.bootloader = {
      target: optionalString(bootloader, source, 'bootloader.target'),
      efiDirectory: optionalString(bootloader, source, 'bootloader.efiDirectory'),
      bootloaderId: optionalString(bootloader, source, 'bootloader.bootloaderId')
    }
  }

  if (root.patching !== undefined) {
    const patching = section(root.patching, source, 'patching', ['onMissingAnchor'])
    const onMissingAnchor = optionalString(patching, source, 'patching.onMissingAnchor')
    if (onMissingAnchor !== undefined && !isMissingAnchorPolicy(onMissingAnchor)) {
      throw new ValidationError(`${source}: patching.onMissingAnchor must be "fail" or "warn", got "${onMissingAnchor}"`)
    }

    input.patching = {onMissingAnchor}
  }

  return input
}

/**
 * Configuration from ZSTRAP_* environment variables (dotenv is loaded by
 * the entry point).
 */
export function envConfig(env: NodeJS.ProcessEnv = process.env): ProvisionConfigInput {
  const input: ProvisionConfigInput = {
    poolName: nonEmpty(env.ZSTRAP_POOL),
    compression: nonEmpty(env.ZSTRAP_COMPRESSION),
    bootEnvironment: nonEmpty(env.ZSTRAP_BOOT_ENVIRONMENT)
  }

  const passphrase = nonEmpty(env.ZSTRAP_PASSPHRASE)
  if (passphrase !== undefined) {
    input.encryption = {passphrase: new Secret(passphrase)}
  }

  return input
}

/**
 * Options shared by the commands that build a configuration.
 */
export type ConfigFlags = {
  config?: string;
  pool?: string;
  compression?: string;
  bootEnvironment?: string;
  encrypt?: boolean;
  swapSize?: number;
  retries?: number;
  archzfsFallback?: boolean;
  onMissingAnchor?: string;
}

export function flagConfig(flags: ConfigFlags, passphrase?: Secret): ProvisionConfigInput {
  const {onMissingAnchor} = flags
  if (onMissingAnchor !== undefined && !isMissingAnchorPolicy(onMissingAnchor)) {
    throw new ValidationError(`--on-missing-anchor must be "fail" or "warn", got "${onMissingAnchor}"`)
  }

  return {
    poolName: flags.pool,
    compression: flags.compression,
    bootEnvironment: flags.bootEnvironment,
    encryption: {enabled: flags.encrypt, passphrase},
    swap: {sizeGb: flags.swapSize},
    packages: {retries: flags.retries, archzfsFallback: flags.archzfsFallback},
    patching: {onMissingAnchor}
  }
}

/**
 * Resolves the configuration for a command: config file, then environment,
 * then flags.
 */
export async function resolveCommandConfig(
  flags: ConfigFlags,
  options: {cwd?: string; env?: NodeJS.ProcessEnv; passphrase?: Secret} = {}
): Promise<ProvisionConfig> {
  const fileInput = await loadConfig(options.cwd ?? process.cwd(), flags.config)
  return resolveConfig(fileInput, envConfig(options.env), flagConfig(flags, options.passphrase))
}

// -- Shape checks ------------------------------------------------------------

type Section = Record<string, unknown>

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown, source: string, path: string, allowed: string[]): Section {
  if (!isSection(value)) {
    throw new ValidationError(`${source}: ${path || 'config'} must be a mapping`)
  }

  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new ValidationError(`${source}: unknown key "${path ? `${path}.${key}` : key}"`)
    }
  }

  return value
}

function optionalString(values: Section, source: string, path: string): string | undefined {
  const value = values[lastSegment(path)]
  if (value === undefined || typeof value === 'string') {
    return value
  }

  throw new ValidationError(`${source}: ${path} must be a string`)
}

function optionalNumber(values: Section, source: string, path: string): number | undefined {
  const value = values[lastSegment(path)]
  if (value === undefined || typeof value === 'number') {
    return value
  }

  throw new ValidationError(`${source}: ${path} must be a number`)
}

function optionalBoolean(values: Section, source: string, path: string): boolean | undefined {
  const value = values[lastSegment(path)]
  if (value === undefined || typeof value === 'boolean') {
    return value
  }

  throw new ValidationError(`${source}: ${path} must be true or false`)
}

function isMissingAnchorPolicy(value: string): value is MissingAnchorPolicy {
  return value === 'fail' || value === 'warn'
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf('.') + 1)
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
