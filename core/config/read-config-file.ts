import { readFile } from 'node:fs/promises'
import { parse } from 'smol-toml'
import { join } from 'node:path'

import { hasErrorCode } from '../guards/has-error-code'
import { ConfigError } from './config-error'
import { isTomlTable } from './is-toml-table'

/**
 * Reads and parses a TOML configuration file.
 *
 * @param directory - Directory holding the file.
 * @param file - File name.
 * @returns Parsed top-level table, or null when the file does not exist.
 */
export async function readConfigFile(
  directory: string,
  file: string,
): Promise<Record<string, unknown> | null> {
  let content: string
  try {
    content = await readFile(join(directory, file), 'utf8')
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null
    }
    throw new ConfigError(`Configuration file ${file} is not readable.`, {
      file,
    })
  }

  let table: unknown
  try {
    table = parse(content)
  } catch (error) {
    let reason = error instanceof Error ? `: ${error.message}` : ''
    throw new ConfigError(`Invalid configuration file ${file}${reason}`, {
      file,
    })
  }

  if (!isTomlTable(table)) {
    throw new ConfigError(`Invalid configuration file ${file}`, { file })
  }
  return table
}
