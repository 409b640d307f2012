import { ConfigError } from './config-error'

/**
 * Reads an optional array-of-strings setting from a configuration table.
 *
 * @param table - Configuration table.
 * @param key - Name of the setting, as written in the file.
 * @param file - Configuration file name, used in error messages.
 * @returns The strings in file order, or an empty array when the key is
 *   absent.
 */
export function readStringArray(
  table: Record<string, unknown>,
  key: string,
  file?: string,
): string[] {
  let value = table[key]
  if (value === undefined) {
    return []
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(`Configuration setting "${key}" should be array.`, {
      file,
      key,
    })
  }

  let result: string[] = []
  for (let item of value as unknown[]) {
    if (typeof item !== 'string') {
      throw new ConfigError(
        `Configuration setting "${key}" should contain only strings.`,
        { file, key },
      )
    }
    result.push(item)
  }
  return result
}
