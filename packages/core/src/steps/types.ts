import type {StepId} from '../types.js'
import type {StepContext} from './context.js'

export type StepCompletion =
  | {status: 'done'}
  | {status: 'skipped'; reason: string}

/**
 * One named unit of the provisioning pipeline. Every step shares this
 * signature so the runner can drive them uniformly; a step signals
 * failure by throwing, and the runner turns that into a StepResult.
 */
export type ProvisionStep = {
  id: StepId;
  name: string;
  run(context: StepContext): Promise<StepCompletion>;
}

export const done: StepCompletion = Object.freeze({status: 'done'})
