import {datasetCreateArgs} from '../planner.js'
import {done, type ProvisionStep} from './types.js'

export const createSwap: ProvisionStep = {
  id: 'create-swap',
  name: 'Create swap volume',
  async run(context) {
    const {datasets, swap} = context.plan

    // Container first, then the volume inside it
    for (const dataset of datasets) {
      if (dataset.group === 'swap') {
        await context.exec(datasetCreateArgs(dataset))
      }
    }

    await context.exec(['mkswap', swap.device])
    return done
  }
}
