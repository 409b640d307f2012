import type { ResolvedConfig } from '../../types/resolved-config'

import { getDefaultConfig, parseConfig } from './parse-config'
import { CONFIG_FILES, PYPROJECT_FILE } from '../constants'
import { readConfigFile } from './read-config-file'
import { getToolTable } from './get-tool-table'

/**
 * Resolves the configuration for a run.
 *
 * Looks in `directory` for `pyproject.toml` (its `[tool.antiseptic]` table),
 * `antiseptic.toml` and `.antiseptic.toml`, in that order. The first file that
 * configures antiseptic wins; a `pyproject.toml` without the table is passed
 * over. Defaults apply when nothing is found.
 *
 * @example
 *   const { config, file } = await resolveConfig(process.cwd())
 *
 * @param directory - Directory to search, usually the working directory.
 * @returns Validated configuration and the file it came from.
 */
export async function resolveConfig(
  directory: string,
): Promise<ResolvedConfig> {
  for (let file of CONFIG_FILES) {
    let table = await readConfigFile(directory, file)
    if (!table) {
      continue
    }

    if (file === PYPROJECT_FILE) {
      let toolTable = getToolTable(table, file)
      if (!toolTable) {
        continue
      }
      return { config: parseConfig(toolTable, file), file }
    }

    return { config: parseConfig(table, file), file }
  }

  return { config: getDefaultConfig(), file: null }
}
