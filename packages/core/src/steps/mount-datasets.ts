import {done, type ProvisionStep} from './types.js'

/**
 * Re-imports the pool rooted at the install target, mounts the datasets
 * that need an explicit `zfs mount` (canmount=noauto, the boot environment
 * first), then everything else.
 */
export const mountDatasets: ProvisionStep = {
  id: 'mount-datasets',
  name: 'Mount datasets',
  async run(context) {
    const {pool, target, datasets} = context.plan

    await context.exec(['zpool', 'export', pool.name])
    await context.exec(['zpool', 'import', '-R', target, pool.name])

    for (const dataset of datasets) {
      if (dataset.mount === 'explicit') {
        await context.exec(['zfs', 'mount', dataset.name])
      }
    }

    await context.exec(['zfs', 'mount', '-a'])
    return done
  }
}
