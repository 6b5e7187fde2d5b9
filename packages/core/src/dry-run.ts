import {RecordingExecutor, type RecordedCommand} from './engine/recording-executor.js'
import {RecordingPatcher, type RecordedPatch} from './patcher.js'

/** One recorded action of a dry run, in the order the steps issued it. */
export type DryRunEntry =
  | {kind: 'command'; command: RecordedCommand}
  | {kind: 'file'; operation: RecordedPatch}

export type DryRun = {
  executor: RecordingExecutor;
  patcher: RecordingPatcher;
  entries: readonly DryRunEntry[];
}

/** Recording executor and patcher that share a single ordered log. */
export function createDryRun(): DryRun {
  const entries: DryRunEntry[] = []
  return {
    executor: new RecordingExecutor(entries),
    patcher: new RecordingPatcher(entries),
    entries
  }
}
