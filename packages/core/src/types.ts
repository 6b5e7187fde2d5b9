import type {Secret} from './secret.js'

// -- Configuration -----------------------------------------------------------

/**
 * What to do when a config file edit cannot find its anchor.
 * - `fail`: the step fails with a ConfigPatchError
 * - `warn`: a STEP_WARNING event is emitted and the step continues
 */
export type MissingAnchorPolicy = 'fail' | 'warn'

export type EncryptionConfig = {
  enabled: boolean;
  passphrase: Secret;
}

export type SwapConfig = {
  /** Swap volume size in whole gigabytes */
  sizeGb: number;
}

export type PackagesConfig = {
  /** Extra attempts for package installs and the initramfs rebuild (0 = none) */
  retries: number;
  /** Delay before the first retry, doubled on each further attempt */
  retryDelayMs: number;
  /** Add the archzfs repository when the ZFS packages cannot be installed */
  archzfsFallback: boolean;
}

export type BootloaderConfig = {
  /** grub-install --target */
  target: string;
  /** grub-install --efi-directory, inside the install target */
  efiDirectory: string;
  /** grub-install --bootloader-id */
  bootloaderId: string;
}

export type PatchingConfig = {
  onMissingAnchor: MissingAnchorPolicy;
}

/**
 * Fully resolved, frozen configuration snapshot handed to the Provisioner.
 */
export type ProvisionConfig = Readonly<{
  poolName: string;
  compression: string;
  bootEnvironment: string;
  encryption: Readonly<EncryptionConfig>;
  swap: Readonly<SwapConfig>;
  packages: Readonly<PackagesConfig>;
  bootloader: Readonly<BootloaderConfig>;
  patching: Readonly<PatchingConfig>;
}>

/**
 * Partial configuration as read from a file, the environment or flags.
 * The passphrase may be given as plain text here and is wrapped on resolve.
 */
export type ProvisionConfigInput = {
  poolName?: string;
  compression?: string;
  bootEnvironment?: string;
  encryption?: {
    enabled?: boolean;
    passphrase?: string | Secret;
  };
  swap?: Partial<SwapConfig>;
  packages?: Partial<PackagesConfig>;
  bootloader?: Partial<BootloaderConfig>;
  patching?: Partial<PatchingConfig>;
}

// -- Specs -------------------------------------------------------------------

/** Absolute path or the sentinel "none". */
export type Mountpoint = string

export type PoolSpec = Readonly<{
  name: string;
  devices: readonly string[];
  ashift: number;
  features: Readonly<Record<string, string>>;
  properties: Readonly<Record<string, string>>;
}>

export type VolumeSpec = Readonly<{
  /** Size argument, e.g. "8G" */
  size: string;
  /** Block size argument, e.g. "4K" */
  blockSize: string;
}>

/**
 * How a dataset gets mounted during the mount step.
 * - `auto`: by `zfs mount -a`
 * - `explicit`: by its own `zfs mount <name>` (canmount=noauto)
 * - `never`: container or volume
 */
export type MountMode = 'auto' | 'explicit' | 'never'

export type DatasetSpec = Readonly<{
  name: string;
  /** Parent dataset name, or the pool name for top-level datasets */
  parent: string;
  kind: 'filesystem' | 'volume';
  mountpoint: Mountpoint;
  properties: Readonly<Record<string, string>>;
  volume?: VolumeSpec;
  /** `system` datasets are created by create-datasets, `swap` ones by create-swap */
  group: 'system' | 'swap';
  mount: MountMode;
}>

export type EncryptionSpec = Readonly<{
  enabled: boolean;
  passphrase: Secret;
  cipher: string;
  keyFormat: string;
  keyLocation: string;
  dataset: DatasetSpec;
}>

export type SwapSpec = Readonly<{
  sizeGb: number;
  blockSize: string;
  /** Device node of the swap volume */
  device: string;
}>

/** Absolute path where the install target is staged. */
export type BootTarget = string

/**
 * Everything the steps need, built once before the first step runs.
 */
export type ProvisionPlan = Readonly<{
  pool: PoolSpec;
  datasets: readonly DatasetSpec[];
  encryption: EncryptionSpec;
  swap: SwapSpec;
  target: BootTarget;
  bootDataset: string;
  packages: Readonly<PackagesConfig>;
  bootloader: Readonly<BootloaderConfig>;
  patching: Readonly<PatchingConfig>;
}>

// -- Results -----------------------------------------------------------------

export type StepId =
  | 'create-pool'
  | 'create-datasets'
  | 'setup-encryption'
  | 'create-swap'
  | 'mount-datasets'
  | 'configure-boot'
  | 'install-packages'
  | 'configure-bootloader'

export type StepErrorDetail = {
  code: string;
  message: string;
}

export type StepResult = {
  step: StepId;
  name: string;
  success: boolean;
  skipped?: boolean;
  error?: StepErrorDetail;
  durationMs: number;
}

export type ProvisionOutcome = {
  success: boolean;
  /** Identity of the first failing step */
  failedStep?: {id: StepId; index: number; name: string};
  error?: StepErrorDetail;
  results: StepResult[];
  /** Steps that completed before the failure, in order; nothing is rolled back */
  completedSteps: StepId[];
}

export type PipelineState =
  | {status: 'pending'}
  | {status: 'running'; stepIndex: number}
  | {status: 'succeeded'}
  | {status: 'failed'; stepIndex: number; error: StepErrorDetail}
