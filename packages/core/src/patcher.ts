import {appendFile, mkdir, readFile, writeFile} from 'node:fs/promises'
import type {DryRunEntry} from './dry-run.js'

/** Literal text or a pattern; a RegExp matches its first occurrence. */
export type TextMatcher = string | RegExp

/** Replacement text, or a function of the matched anchor. */
export type Insertion = string | ((matched: string) => string)

/**
 * Outcome of a config file edit.
 * - `present`: the presence token was already there, nothing written
 * - `patched`: the anchor was replaced and the file rewritten
 * - `anchor-missing`: neither token nor anchor found, file left unchanged
 */
export type PatchStatus = 'present' | 'patched' | 'anchor-missing'

export type PatchResult = {
  filePath: string;
  status: PatchStatus;
}

/**
 * File operations the pipeline performs on the install target.
 */
export type Patcher = {
  ensureToken(filePath: string, anchor: TextMatcher, insertion: Insertion, presenceToken: TextMatcher): Promise<PatchResult>;
  appendIfMissing(filePath: string, block: string, presenceToken: TextMatcher): Promise<PatchResult>;
  ensureDirectory(dirPath: string): Promise<void>;
}

export function contains(content: string, matcher: TextMatcher): boolean {
  return typeof matcher === 'string' ? content.includes(matcher) : new RegExp(matcher.source, matcher.flags.replace('g', '')).test(content)
}

export function describeMatcher(matcher: TextMatcher): string {
  return typeof matcher === 'string' ? JSON.stringify(matcher) : String(matcher)
}

/**
 * Replaces the first occurrence of `anchor` in `content`.
 * Returns undefined when the anchor does not occur.
 */
export function replaceAnchor(content: string, anchor: TextMatcher, insertion: Insertion): string | undefined {
  let start: number
  let matched: string

  if (typeof anchor === 'string') {
    start = content.indexOf(anchor)
    matched = anchor
  } else {
    const match = new RegExp(anchor.source, anchor.flags.replace('g', '')).exec(content)
    if (!match) {
      return undefined
    }

    start = match.index
    matched = match[0]
  }

  if (start === -1) {
    return undefined
  }

  const replacement = typeof insertion === 'string' ? insertion : insertion(matched)
  return content.slice(0, start) + replacement + content.slice(start + matched.length)
}

/**
 * Idempotently inserts a token into a line-oriented config file.
 *
 * When `presenceToken` already occurs the file is not written. Otherwise
 * the first match of `anchor` is replaced by `insertion`. A missing anchor
 * leaves the file untouched and is reported as `anchor-missing`.
 */
export async function ensureToken(filePath: string, anchor: TextMatcher, insertion: Insertion, presenceToken: TextMatcher): Promise<PatchResult> {
  const content = await readFile(filePath, 'utf8')
  if (contains(content, presenceToken)) {
    return {filePath, status: 'present'}
  }

  const patched = replaceAnchor(content, anchor, insertion)
  if (patched === undefined) {
    return {filePath, status: 'anchor-missing'}
  }

  await writeFile(filePath, patched, 'utf8')
  return {filePath, status: 'patched'}
}

/**
 * Appends `block` to the file unless `presenceToken` already occurs.
 * A missing trailing newline is added first so the block starts on its own line.
 */
export async function appendIfMissing(filePath: string, block: string, presenceToken: TextMatcher): Promise<PatchResult> {
  const content = await readFile(filePath, 'utf8')
  if (contains(content, presenceToken)) {
    return {filePath, status: 'present'}
  }

  const separator = content.length > 0 && !content.endsWith('\n') ? '\n' : ''
  await appendFile(filePath, separator + block, 'utf8')
  return {filePath, status: 'patched'}
}

export const fsPatcher: Patcher = {
  ensureToken,
  appendIfMissing,
  async ensureDirectory(dirPath: string): Promise<void> {
    await mkdir(dirPath, {recursive: true})
  }
}

export type RecordedPatch =
  | {operation: 'ensureToken'; filePath: string; anchor: string}
  | {operation: 'appendIfMissing'; filePath: string}
  | {operation: 'ensureDirectory'; dirPath: string}

/**
 * Patcher that touches nothing and reports every edit as applied.
 * Used with the RecordingExecutor for dry runs.
 */
export class RecordingPatcher implements Patcher {
  readonly operations: RecordedPatch[] = []

  constructor(private readonly log?: DryRunEntry[]) {}

  async ensureToken(filePath: string, anchor: TextMatcher): Promise<PatchResult> {
    this.record({operation: 'ensureToken', filePath, anchor: describeMatcher(anchor)})
    return {filePath, status: 'patched'}
  }

  async appendIfMissing(filePath: string): Promise<PatchResult> {
    this.record({operation: 'appendIfMissing', filePath})
    return {filePath, status: 'patched'}
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    this.record({operation: 'ensureDirectory', dirPath})
  }

  private record(operation: RecordedPatch): void {
    this.operations.push(operation)
    this.log?.push({kind: 'file', operation})
  }
}
