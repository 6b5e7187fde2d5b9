import {poolCreateArgs} from '../plan.js'
import {done, type ProvisionStep} from './types.js'

export const createPool: ProvisionStep = {
  id: 'create-pool',
  name: 'Create pool',
  async run(context) {
    await context.exec(poolCreateArgs(context.plan.pool))
    return done
  }
}
