import pc from 'picocolors'

import type { SkippedFile } from '../types/skipped-file'

/** Human-readable descriptions of skip reasons. */
const REASONS: Record<SkippedFile['reason'], string> = {
  'not-utf8': 'did not contain valid UTF-8',
  unreadable: 'could not be read',
  binary: 'looks like a binary file',
}

/**
 * Prints a warning for a file that was left unchecked.
 *
 * @param skipped - Skipped file and the reason.
 */
export function printSkippedFile(skipped: SkippedFile): void {
  console.warn(pc.gray(`Skipped ${skipped.path}: ${REASONS[skipped.reason]}`))
}
