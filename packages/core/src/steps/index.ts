import {configureBoot} from './configure-boot.js'
import {configureBootloader} from './configure-bootloader.js'
import {createDatasets} from './create-datasets.js'
import {createPool} from './create-pool.js'
import {createSwap} from './create-swap.js'
import {installPackages} from './install-packages.js'
import {mountDatasets} from './mount-datasets.js'
import {setupEncryption} from './setup-encryption.js'
import type {ProvisionStep} from './types.js'

/**
 * The pipeline, in execution order.
 */
export const provisionSteps: readonly ProvisionStep[] = Object.freeze([
  createPool,
  createDatasets,
  setupEncryption,
  createSwap,
  mountDatasets,
  configureBoot,
  installPackages,
  configureBootloader
])

export {StepContext, defaultSleep, type Sleep} from './context.js'
export type {ProvisionStep, StepCompletion} from './types.js'
export {bootServices} from './configure-boot.js'
export {zfsPackages} from './install-packages.js'
export * from './boot-files.js'
export {
  configureBoot,
  configureBootloader,
  createDatasets,
  createPool,
  createSwap,
  installPackages,
  mountDatasets,
  setupEncryption
}
