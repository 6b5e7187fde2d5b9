import {mkdtemp, writeFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {dryRunLines, formatCommand, parseInteger, readPassphraseFile} from '../utils.js'

// ---------------------------------------------------------------------------
// parseInteger
// ---------------------------------------------------------------------------

test('parseInteger: parses whole numbers', t => {
  t.is(parseInteger('8'), 8)
  t.is(parseInteger('0'), 0)
})

test('parseInteger: rejects anything else', t => {
  for (const value of ['-1', '1.5', '8G', '']) {
    t.throws(() => parseInteger(value), {instanceOf: InvalidArgumentError})
  }
})

// ---------------------------------------------------------------------------
// readPassphraseFile
// ---------------------------------------------------------------------------

test('readPassphraseFile: reads the first line without its newline', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'zstrap-test-'))
  try {
    const file = join(dir, 'passphrase')
    await writeFile(file, 'test-passphrase\nignored\n')
    const secret = await readPassphraseFile(file)
    t.is(secret.reveal(), 'test-passphrase')
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('readPassphraseFile: throws on an empty file', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'zstrap-test-'))
  try {
    const file = join(dir, 'passphrase')
    await writeFile(file, '\n')
    await t.throwsAsync(async () => readPassphraseFile(file), {message: `Passphrase file ${file} is empty`})
  } finally {
    await rm(dir, {recursive: true})
  }
})

// ---------------------------------------------------------------------------
// formatCommand / dryRunLines
// ---------------------------------------------------------------------------

test('formatCommand: leaves plain arguments unquoted', t => {
  t.is(formatCommand(['zfs', 'create', '-o', 'mountpoint=/', 'rpool/ROOT/default']), 'zfs create -o mountpoint=/ rpool/ROOT/default')
})

test('formatCommand: quotes arguments with spaces or quotes', t => {
  t.is(formatCommand(['echo', 'two words']), 'echo \'two words\'')
  t.is(formatCommand(['echo', 'it\'s']), 'echo \'it\'\\\'\'s\'')
})

test('dryRunLines: keeps commands and file operations in call order', t => {
  const lines = dryRunLines([
    {kind: 'command', command: {argv: ['zpool', 'set', 'cachefile=/etc/zfs/zpool.cache', 'rpool'], interactive: false, inputLineCount: 0}},
    {kind: 'file', operation: {operation: 'ensureDirectory', dirPath: '/mnt/etc/zfs'}},
    {kind: 'command', command: {argv: ['zfs', 'create', 'rpool/encrypted'], interactive: true, inputLineCount: 2}},
    {kind: 'file', operation: {operation: 'ensureToken', filePath: '/mnt/etc/default/grub', anchor: '/^GRUB_CMDLINE_LINUX=""$/m'}},
    {kind: 'command', command: {argv: ['arch-chroot', '/mnt', 'grub-install'], interactive: false, inputLineCount: 0}},
    {kind: 'file', operation: {operation: 'appendIfMissing', filePath: '/mnt/etc/pacman.conf'}}
  ])

  t.deepEqual(lines, [
    'zpool set cachefile=/etc/zfs/zpool.cache rpool',
    'mkdir -p /mnt/etc/zfs',
    'zfs create rpool/encrypted < (2 lines on stdin)',
    'patch /mnt/etc/default/grub at /^GRUB_CMDLINE_LINUX=""$/m',
    'arch-chroot /mnt grub-install',
    'append /mnt/etc/pacman.conf'
  ])
})
