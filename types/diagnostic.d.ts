/**
 * A single reported spelling mistake.
 */
export interface Diagnostic {
  /**
   * Human-readable description, e.g. "spelling mistake `helol`".
   */
  message: string

  /**
   * 1-based column of the word, counted in characters.
   */
  column: number

  /**
   * Display path of the checked file.
   */
  path: string

  /**
   * The misspelled word in its original case.
   */
  word: string

  /**
   * 1-based line number of the word.
   */
  line: number

  /**
   * Diagnostic code.
   */
  code: 'AS001'
}
