import {join} from 'node:path'

// -- initramfs hooks ---------------------------------------------------------

export const hooksFile = '/etc/mkinitcpio.conf'

/** The uncommented `HOOKS=(...)` assignment. */
export const hooksAnchor = /^HOOKS=\(([^)]*)\)/m

/** A `HOOKS=(...)` assignment that already lists the zfs hook. */
export const hooksPresence = /^HOOKS=\([^)]*(?<![\w-])zfs(?![\w-])[^)]*\)/m

/**
 * Rewrites a `HOOKS=(...)` assignment with `hook` placed right before
 * `filesystems`, or at the end of the list when there is none.
 */
export function insertHook(assignment: string, hook = 'zfs'): string {
  const match = /^HOOKS=\(([^)]*)\)$/.exec(assignment)
  const hooks = match ? match[1].split(/\s+/).filter(Boolean) : []
  const position = hooks.indexOf('filesystems')
  if (position === -1) {
    hooks.push(hook)
  } else {
    hooks.splice(position, 0, hook)
  }

  return `HOOKS=(${hooks.join(' ')})`
}

// -- GRUB defaults -----------------------------------------------------------

export const grubDefaultsFile = '/etc/default/grub'

/** Empty kernel command line assignment. */
export const grubCmdlineAnchor = /^GRUB_CMDLINE_LINUX=""$/m

export const grubCmdlinePresence = 'root=ZFS='

export function grubCmdline(bootDataset: string): string {
  return `GRUB_CMDLINE_LINUX="root=ZFS=${bootDataset} zfs_force=1"`
}

export const grubConfigFile = '/boot/grub/grub.cfg'

// -- archzfs repository ------------------------------------------------------

export const pacmanConfFile = '/etc/pacman.conf'

export const archzfsKeyId = 'F75D9D76'

export const archzfsPresence = '[archzfs]'

export const archzfsBlock = '\n[archzfs]\nServer = https://archzfs.com/$repo/$arch\n'

// -- ZFS cache file ----------------------------------------------------------

export const cacheFile = '/etc/zfs/zpool.cache'

/**
 * Resolves a path inside the install target.
 */
export function inTarget(target: string, path: string): string {
  return join(target, path)
}
