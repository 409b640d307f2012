/**
 * A word extracted from text.
 */
export interface Token {
  /**
   * 1-based column, counted in characters.
   */
  column: number

  /**
   * Alphabetic characters of the word, in their original case.
   */
  text: string

  /**
   * 1-based line number.
   */
  line: number
}
