/**
 * Resolved spell-checking configuration.
 */
export interface Config {
  /**
   * Words treated as correctly spelled, case-folded.
   */
  allowedWords: ReadonlySet<string>

  /**
   * Glob patterns excluded from the scan, in addition to the built-in ones.
   */
  exclude: readonly string[]

  /**
   * Tokens shorter than this many characters are never reported.
   */
  minWordLength: number
}
