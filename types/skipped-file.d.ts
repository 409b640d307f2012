/**
 * A file left unchecked because its content could not be used.
 */
export interface SkippedFile {
  /**
   * Why the file was skipped.
   */
  reason: 'unreadable' | 'not-utf8' | 'binary'

  /**
   * Display path of the file.
   */
  path: string
}
