import type { Token } from '../../types/token'

import { splitWordRun } from './split-word-run'
import { isAlphabetic } from './character-classes'

/**
 * Lazily extracts word tokens from text.
 *
 * A word is a maximal run of alphabetic characters, further split at
 * lowercase to uppercase transitions (see `splitWordRun`). Digits,
 * punctuation and whitespace end a word. Lines and columns are 1-based and
 * counted in characters (code points), so `é` or an emoji each take a single
 * column.
 *
 * @example
 *   const tokens = [...tokenize('helloWorld')]
 *   // hello at 1:1, World at 1:6
 *
 * @param text - Any text; never causes an error.
 * @yields Tokens in order of appearance.
 */
export function* tokenize(text: string): Generator<Token> {
  let line = 1
  let column = 1
  let run: string[] = []
  let runColumn = 1

  function* flush(): Generator<Token> {
    if (run.length === 0) {
      return
    }
    let starts = splitWordRun(run)
    for (let [index, start] of starts.entries()) {
      let end = starts[index + 1] ?? run.length
      yield {
        text: run.slice(start, end).join(''),
        column: runColumn + start,
        line,
      }
    }
    run = []
  }

  for (let character of text) {
    if (isAlphabetic(character)) {
      if (run.length === 0) {
        runColumn = column
      }
      run.push(character)
      column++
      continue
    }

    yield* flush()

    if (character === '\n') {
      line++
      column = 1
    } else {
      column++
    }
  }

  yield* flush()
}
