/**
 * Lines of a file suppressed by ignore directives.
 */
export interface IgnoredLines {
  /**
   * One-based numbers of ignored lines.
   */
  lines: Set<number>

  /**
   * Whether the whole file is ignored.
   */
  file: boolean
}
