import {grubCmdline, grubCmdlineAnchor, grubCmdlinePresence, grubConfigFile, grubDefaultsFile, inTarget} from './boot-files.js'
import {done, type ProvisionStep} from './types.js'

export const configureBootloader: ProvisionStep = {
  id: 'configure-bootloader',
  name: 'Configure bootloader',
  async run(context) {
    const {target, bootDataset, bootloader} = context.plan

    await context.exec(context.chroot('pacman', '-S', '--noconfirm', 'grub'))

    await context.patch(inTarget(target, grubDefaultsFile), grubCmdlineAnchor, grubCmdline(bootDataset), grubCmdlinePresence)

    await context.exec(context.chroot(
      'grub-install',
      `--target=${bootloader.target}`,
      `--efi-directory=${bootloader.efiDirectory}`,
      `--bootloader-id=${bootloader.bootloaderId}`
    ))
    await context.exec(context.chroot('grub-mkconfig', '-o', grubConfigFile))
    return done
  }
}
