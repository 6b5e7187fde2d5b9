import {dirname} from 'node:path'
import {cacheFile, inTarget} from './boot-files.js'
import {done, type ProvisionStep} from './types.js'

export const bootServices = ['zfs.target', 'zfs-import-cache', 'zfs-mount', 'zfs-import.target'] as const

export const configureBoot: ProvisionStep = {
  id: 'configure-boot',
  name: 'Configure boot',
  async run(context) {
    const {pool, target, bootDataset} = context.plan

    await context.exec(['zpool', 'set', `bootfs=${bootDataset}`, pool.name])

    await context.ensureDirectory(inTarget(target, dirname(cacheFile)))
    await context.exec(['zpool', 'set', `cachefile=${cacheFile}`, pool.name])

    for (const service of bootServices) {
      await context.exec(['systemctl', '--root', target, 'enable', service])
    }

    return done
  }
}
