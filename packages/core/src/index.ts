// Engine layer
export {CommandExecutor, ExecaCommandExecutor, RecordingExecutor, commandEnv} from './engine/index.js'
export type {CommandResult, LogLine, OnLogLine, RunOptions, RecordedCommand} from './engine/index.js'

// Provisioning pipeline
export {Provisioner, type ProvisionerOptions} from './provisioner.js'
export {
  provisionSteps,
  StepContext,
  defaultSleep,
  bootServices,
  zfsPackages,
  createPool,
  createDatasets,
  setupEncryption,
  createSwap,
  mountDatasets,
  configureBoot,
  installPackages,
  configureBootloader,
  hooksFile,
  hooksAnchor,
  hooksPresence,
  insertHook,
  grubDefaultsFile,
  grubCmdlineAnchor,
  grubCmdlinePresence,
  grubCmdline,
  grubConfigFile,
  cacheFile
} from './steps/index.js'
export type {ProvisionStep, StepCompletion, Sleep} from './steps/index.js'

// Planning
export {buildPlan, buildPoolSpec, poolCreateArgs, resolveBootTarget, poolAshift} from './plan.js'
export {planDatasets, planEncryptedDataset, passphraseEncryption, datasetCreateArgs, validateHierarchy, bootDatasetName, swapDevicePath, swapBlockSize} from './planner.js'
export type {HierarchyOptions, EncryptionKeyOptions} from './planner.js'

// Config file patching
export {ensureToken, appendIfMissing, replaceAnchor, fsPatcher, RecordingPatcher} from './patcher.js'
export type {Patcher, PatchResult, PatchStatus, TextMatcher, Insertion, RecordedPatch} from './patcher.js'
export {createDryRun} from './dry-run.js'
export type {DryRun, DryRunEntry} from './dry-run.js'

// Configuration
export {resolveConfig, validatePoolName, defaultConfig} from './config.js'
export {Secret} from './secret.js'

// Reporting
export {ConsoleReporter, CompositeReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  ProvisionEvent,
  ProvisionStartEvent,
  StepStartingEvent,
  StepFinishedEvent,
  StepSkippedEvent,
  StepFailedEvent,
  StepWarningEvent,
  CommandStartedEvent,
  CommandLogEvent,
  ProvisionFinishedEvent,
  ProvisionFailedEvent
} from './reporter.js'

// Utilities
export {formatDuration} from './utils.js'

// Domain types
export type {
  ProvisionConfig,
  ProvisionConfigInput,
  EncryptionConfig,
  SwapConfig,
  PackagesConfig,
  BootloaderConfig,
  PatchingConfig,
  MissingAnchorPolicy,
  PoolSpec,
  DatasetSpec,
  VolumeSpec,
  MountMode,
  EncryptionSpec,
  SwapSpec,
  BootTarget,
  ProvisionPlan,
  StepId,
  StepResult,
  StepErrorDetail,
  ProvisionOutcome,
  PipelineState
} from './types.js'

// Errors
export {
  ZstrapError,
  CommandError,
  ToolNotAvailableError,
  ExternalCommandError,
  InteractiveInputError,
  ConfigPatchError,
  PipelineError,
  ValidationError
} from './errors.js'
