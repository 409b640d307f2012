/**
 * Immutable case-insensitive word set.
 */
export interface Dictionary {
  /**
   * Checks whether a word is known, ignoring case.
   */
  contains(word: string): boolean
}
