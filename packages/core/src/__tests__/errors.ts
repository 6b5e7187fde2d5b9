import test from 'ava'
import {ConfigPatchError, ExternalCommandError, InteractiveInputError, PipelineError, ZstrapError} from '../errors.js'

test('ExternalCommandError names the command and the last stderr line', t => {
  const error = new ExternalCommandError(['zpool', 'import', 'rpool'], 1, 'first line\ncannot import \'rpool\': no such pool\n')

  t.is(error.message, 'Command "zpool import rpool" failed with exit code 1: cannot import \'rpool\': no such pool')
  t.is(error.code, 'EXTERNAL_COMMAND_FAILED')
  t.is(error.exitCode, 1)
  t.true(error.transient)
  t.true(error instanceof ZstrapError)
})

test('ExternalCommandError is not transient for a missing program', t => {
  t.false(new ExternalCommandError(['arch-chroot', '/mnt', 'mkinitcpio', '-P'], 127).transient)
  t.false(new ExternalCommandError(['arch-chroot', '/mnt', 'mkinitcpio', '-P'], 126).transient)
  t.false(new ExternalCommandError(['zpool', 'version'], 1, 'spawn zpool ENOENT', {spawnFailed: true}).transient)
})

test('ExternalCommandError without stderr ends at the exit code', t => {
  const error = new ExternalCommandError(['mkswap', '/dev/zvol/rpool/swap/swapfile'], 2)
  t.is(error.message, 'Command "mkswap /dev/zvol/rpool/swap/swapfile" failed with exit code 2')
})

test('InteractiveInputError names only the program', t => {
  const error = new InteractiveInputError(['zfs', 'create', 'rpool/encrypted'], 255)
  t.is(error.message, 'Interactive input to "zfs create rpool/encrypted" was rejected (exit code 255)')
  t.false(error.transient)
})

test('ConfigPatchError names the anchor and the file', t => {
  const error = new ConfigPatchError('/mnt/etc/default/grub', '"GRUB_CMDLINE_LINUX=\\"\\""')
  t.is(error.code, 'CONFIG_ANCHOR_MISSING')
  t.is(error.message, 'Anchor "GRUB_CMDLINE_LINUX=\\"\\"" not found in /mnt/etc/default/grub, file left unchanged')
})

test('errors keep their cause', t => {
  const cause = new Error('boom')
  const error = new PipelineError('wrapped', {cause})
  t.is(error.cause, cause)
  t.is(error.name, 'PipelineError')
})
