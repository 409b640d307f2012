import { isLowercase, isUppercase } from './character-classes'

/**
 * Splits a run of alphabetic characters into sub-words at lowercase to
 * uppercase transitions, as in `camelCase` or `parseHTMLString`.
 *
 * Uppercase to uppercase is never a boundary, so acronyms stay whole
 * (`HTMLParser`). A transition right after the first character of a segment is
 * not a boundary either, so `iPhone` is not split into `i` and `Phone`.
 *
 * @param characters - Code points of the run.
 * @returns Offsets (in code points) where each sub-word starts; always begins
 *   with 0.
 */
export function splitWordRun(characters: readonly string[]): number[] {
  let starts = [0]
  let segmentStart = 0

  for (let index = 1; index < characters.length; index++) {
    let previous = characters[index - 1] ?? ''
    let current = characters[index] ?? ''
    if (
      index - segmentStart >= 2 &&
      isLowercase(previous) &&
      isUppercase(current)
    ) {
      starts.push(index)
      segmentStart = index
    }
  }

  return starts
}
