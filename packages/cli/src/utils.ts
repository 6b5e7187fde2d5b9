import {readFile} from 'node:fs/promises'
import {InvalidArgumentError, type Command} from 'commander'
import {Secret, type DryRunEntry, type RecordedPatch} from '@zstrap/core'

export type GlobalOptions = {
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Commander argument parser for whole numbers.
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected a whole number, got "${value}"`)
  }

  return Number.parseInt(value, 10)
}

/**
 * Reads a passphrase from the first line of a file. The trailing newline is
 * not part of the passphrase.
 */
export async function readPassphraseFile(filePath: string): Promise<Secret> {
  const content = await readFile(filePath, 'utf8')
  const [firstLine = ''] = content.split(/\r?\n/)
  if (firstLine === '') {
    throw new Error(`Passphrase file ${filePath} is empty`)
  }

  return new Secret(firstLine)
}

/**
 * Renders an argv as a shell-like line for display. Arguments with spaces
 * or quotes are single-quoted.
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(arg => /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replaceAll('\'', '\'\\\'\'')}'`).join(' ')
}

/**
 * Lines of a dry-run report, one per recorded command or file operation, in
 * the order the steps issued them.
 */
export function dryRunLines(entries: readonly DryRunEntry[]): string[] {
  return entries.map(entry => {
    if (entry.kind === 'file') {
      return fileOperationLine(entry.operation)
    }

    const {argv, interactive, inputLineCount} = entry.command
    return interactive
      ? `${formatCommand(argv)} < (${inputLineCount} lines on stdin)`
      : formatCommand(argv)
  })
}

function fileOperationLine(operation: RecordedPatch): string {
  switch (operation.operation) {
    case 'ensureToken': {
      return `patch ${operation.filePath} at ${operation.anchor}`
    }

    case 'appendIfMissing': {
      return `append ${operation.filePath}`
    }

    case 'ensureDirectory': {
      return `mkdir -p ${operation.dirPath}`
    }
  }
}
