/**
 * Decides which paths are left out of a scan.
 */
export interface PathFilter {
  /**
   * Checks whether a path matches any exclude pattern.
   */
  shouldSkip(path: string): boolean

  /**
   * Effective patterns, built-in defaults first.
   */
  readonly patterns: readonly string[]
}
