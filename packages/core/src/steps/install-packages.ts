import {commandFailure, type StepContext} from './context.js'
import {archzfsBlock, archzfsKeyId, archzfsPresence, hooksAnchor, hooksFile, hooksPresence, inTarget, insertHook, pacmanConfFile} from './boot-files.js'
import {done, type ProvisionStep} from './types.js'

export const zfsPackages = ['zfs-dkms', 'zfs-utils'] as const

/**
 * Installs the ZFS userland and kernel module into the target, adds the
 * zfs initramfs hook and rebuilds the boot images.
 */
export const installPackages: ProvisionStep = {
  id: 'install-packages',
  name: 'Install ZFS packages',
  async run(context) {
    // Headers may already be present; a failure here is not fatal
    const headers = await context.attempt(context.chroot('pacman', '-S', '--noconfirm', 'linux-headers'))
    if (headers.exitCode !== 0) {
      context.warn(`Failed to install linux-headers (exit code ${headers.exitCode}), continuing`)
    }

    const install = await context.attempt(context.chroot('pacman', '-S', '--noconfirm', ...zfsPackages))
    if (install.exitCode !== 0) {
      if (!context.plan.packages.archzfsFallback) {
        throw commandFailure(install)
      }

      context.warn('Failed to install ZFS packages from the configured repositories, trying archzfs')
      await installFromArchzfs(context)
    }

    await context.patch(inTarget(context.plan.target, hooksFile), hooksAnchor, matched => insertHook(matched), hooksPresence)

    await context.execWithRetries(context.chroot('mkinitcpio', '-P'))
    return done
  }
}

async function installFromArchzfs(context: StepContext): Promise<void> {
  await context.append(inTarget(context.plan.target, pacmanConfFile), archzfsBlock, archzfsPresence)

  for (const args of [['-r', archzfsKeyId], ['--lsign-key', archzfsKeyId]]) {
    const result = await context.attempt(context.chroot('pacman-key', ...args))
    if (result.exitCode !== 0) {
      context.warn(`Could not import the archzfs signing key (pacman-key ${args.join(' ')} exited with ${result.exitCode})`)
      break
    }
  }

  const sync = await context.attempt(context.chroot('pacman', '-Syy'))
  if (sync.exitCode !== 0) {
    context.warn(`Failed to refresh the package databases (exit code ${sync.exitCode})`)
  }

  for (const pkg of zfsPackages) {
    await context.execWithRetries(context.chroot('pacman', '-S', '--noconfirm', pkg))
  }
}
