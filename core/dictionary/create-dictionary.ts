import type { Dictionary } from '../../types/dictionary'

/**
 * Builds an immutable case-insensitive dictionary.
 *
 * Words are case-folded once here, so every lookup is a single set membership
 * test.
 *
 * @param vocabulary - Base word list, e.g. the bundled vocabulary.
 * @param allowedWords - Extra words accepted by the configuration.
 * @returns Frozen dictionary.
 */
export function createDictionary(
  vocabulary: Iterable<string>,
  allowedWords: Iterable<string> = [],
): Dictionary {
  let words = new Set<string>()
  for (let source of [vocabulary, allowedWords]) {
    for (let word of source) {
      let folded = word.trim().toLowerCase()
      if (folded) {
        words.add(folded)
      }
    }
  }

  return Object.freeze({
    contains(word: string): boolean {
      return words.has(word.toLowerCase())
    },
  })
}
