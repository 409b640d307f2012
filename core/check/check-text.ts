import type { Dictionary } from '../../types/dictionary'
import type { Diagnostic } from '../../types/diagnostic'

import { getIgnoredLines } from '../ignore/get-ignored-lines'
import { tokenize } from '../tokenizer/tokenize'
import { DIAGNOSTIC_CODE } from '../constants'

/** Options for checking a single text. */
interface CheckTextOptions {
  /** Tokens shorter than this many characters are not reported. */
  minWordLength?: number

  /** Known words. */
  dictionary: Dictionary
}

/**
 * Spell-checks the content of one file.
 *
 * @param path - Display path attached to each diagnostic.
 * @param content - File content.
 * @param options - Dictionary and reporting options.
 * @returns Diagnostics in line, then column order.
 */
export function checkText(
  path: string,
  content: string,
  options: CheckTextOptions,
): Diagnostic[] {
  let { minWordLength = 1, dictionary } = options

  let ignored = getIgnoredLines(content)
  if (ignored.file) {
    return []
  }

  let diagnostics: Diagnostic[] = []
  for (let token of tokenize(content)) {
    if (
      ignored.lines.has(token.line) ||
      [...token.text].length < minWordLength ||
      dictionary.contains(token.text)
    ) {
      continue
    }

    diagnostics.push({
      message: `spelling mistake \`${token.text}\``,
      column: token.column,
      code: DIAGNOSTIC_CODE,
      word: token.text,
      line: token.line,
      path,
    })
  }
  return diagnostics
}
