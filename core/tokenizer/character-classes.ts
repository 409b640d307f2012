const ALPHABETIC = /^\p{Alphabetic}$/u
const LOWERCASE = /^\p{Lowercase}$/u
const UPPERCASE = /^\p{Uppercase}$/u

/**
 * Checks whether a single character can be part of a word. Any Unicode
 * alphabetic character qualifies, letters with diacritics included.
 *
 * @param character - One code point.
 * @returns True if the character is alphabetic.
 */
export function isAlphabetic(character: string): boolean {
  return ALPHABETIC.test(character)
}

/**
 * @param character - One code point.
 * @returns True if the character is lowercase.
 */
export function isLowercase(character: string): boolean {
  return LOWERCASE.test(character)
}

/**
 * @param character - One code point.
 * @returns True if the character is uppercase.
 */
export function isUppercase(character: string): boolean {
  return UPPERCASE.test(character)
}
