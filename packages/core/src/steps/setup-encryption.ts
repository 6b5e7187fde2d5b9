import {InteractiveInputError} from '../errors.js'
import {datasetCreateArgs} from '../planner.js'
import {done, type ProvisionStep} from './types.js'

/**
 * Creates the encrypted dataset, answering the passphrase prompt and its
 * confirmation. The passphrase is zeroed as soon as the call returns.
 */
export const setupEncryption: ProvisionStep = {
  id: 'setup-encryption',
  name: 'Set up encryption',
  async run(context) {
    const {encryption} = context.plan
    if (!encryption.enabled) {
      return {status: 'skipped', reason: 'encryption disabled'}
    }

    if (encryption.passphrase.isEmpty) {
      return {status: 'skipped', reason: 'no passphrase provided'}
    }

    const argv = datasetCreateArgs(encryption.dataset)
    let exitCode: number
    try {
      const line = `${encryption.passphrase.reveal()}\n`
      const result = await context.execInteractive(argv, [line, line])
      exitCode = result.exitCode
    } finally {
      encryption.passphrase.clear()
    }

    if (exitCode !== 0) {
      throw new InteractiveInputError(argv, exitCode)
    }

    return done
  }
}
