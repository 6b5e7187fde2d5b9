import {datasetCreateArgs} from '../planner.js'
import {done, type ProvisionStep} from './types.js'

/**
 * Creates the `system` datasets one by one, in planner order, so every
 * parent exists before its children.
 */
export const createDatasets: ProvisionStep = {
  id: 'create-datasets',
  name: 'Create datasets',
  async run(context) {
    for (const dataset of context.plan.datasets) {
      if (dataset.group === 'system') {
        await context.exec(datasetCreateArgs(dataset))
      }
    }

    return done
  }
}
