import type { Config } from '../../types/config'

import { readStringArray } from './read-string-array'
import { ConfigError } from './config-error'

/** Minimum token length used when the setting is absent. */
const DEFAULT_MIN_WORD_LENGTH = 1

/**
 * Builds a typed configuration from a parsed TOML table.
 *
 * Recognized keys are `exclude`, `allowed-words` and `min-word-length`;
 * anything else is ignored.
 *
 * @param table - The antiseptic configuration table.
 * @param file - Configuration file name, used in error messages.
 * @returns Validated configuration.
 */
export function parseConfig(
  table: Record<string, unknown>,
  file?: string,
): Config {
  let exclude = [...new Set(readStringArray(table, 'exclude', file))]
  let allowedWords = new Set(
    readStringArray(table, 'allowed-words', file).map(word =>
      word.toLowerCase(),
    ),
  )

  let minWordLength = DEFAULT_MIN_WORD_LENGTH
  let rawMinWordLength = table['min-word-length']
  if (rawMinWordLength !== undefined) {
    if (
      typeof rawMinWordLength !== 'number' ||
      !Number.isInteger(rawMinWordLength) ||
      rawMinWordLength < 1
    ) {
      throw new ConfigError(
        'Configuration setting "min-word-length" should be a positive integer.',
        { key: 'min-word-length', file },
      )
    }
    minWordLength = rawMinWordLength
  }

  return { allowedWords, minWordLength, exclude }
}

/**
 * Configuration used when no configuration file is found.
 *
 * @returns Default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    minWordLength: DEFAULT_MIN_WORD_LENGTH,
    allowedWords: new Set(),
    exclude: [],
  }
}
