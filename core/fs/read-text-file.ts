import { readFile } from 'node:fs/promises'

import type { SkippedFile } from '../../types/skipped-file'

/** Outcome of reading a file as text. */
export type TextFileResult =
  | { reason: SkippedFile['reason']; ok: false }
  | { content: string; ok: true }

/**
 * Reads a file as UTF-8 text.
 *
 * Content with a NUL byte is treated as binary. A leading byte order mark is
 * dropped.
 *
 * @param filePath - Absolute path to the file.
 * @returns The text, or the reason it could not be used.
 */
export async function readTextFile(filePath: string): Promise<TextFileResult> {
  let buffer: Buffer
  try {
    buffer = await readFile(filePath)
  } catch {
    return { reason: 'unreadable', ok: false }
  }

  if (buffer.includes(0)) {
    return { reason: 'binary', ok: false }
  }

  try {
    let decoder = new TextDecoder('utf-8', { fatal: true })
    return { content: decoder.decode(buffer), ok: true }
  } catch {
    return { reason: 'not-utf8', ok: false }
  }
}
