import { ConfigError } from './config-error'
import { isTomlTable } from './is-toml-table'
import { TOOL_TABLE } from '../constants'

/**
 * Extracts the `[tool.antiseptic]` table from a parsed `pyproject.toml`.
 *
 * @param table - Top-level pyproject table.
 * @param file - File name, used in error messages.
 * @returns The antiseptic table, or null when the file does not configure
 *   antiseptic.
 */
export function getToolTable(
  table: Record<string, unknown>,
  file: string,
): Record<string, unknown> | null {
  let tool = table['tool']
  if (tool === undefined) {
    return null
  }
  if (!isTomlTable(tool)) {
    throw new ConfigError(`Setting "tool" in ${file} should be a table.`, {
      key: 'tool',
      file,
    })
  }

  let antiseptic = tool[TOOL_TABLE]
  if (antiseptic === undefined) {
    return null
  }
  if (!isTomlTable(antiseptic)) {
    throw new ConfigError(
      `Setting "tool.${TOOL_TABLE}" in ${file} should be a table.`,
      { key: `tool.${TOOL_TABLE}`, file },
    )
  }
  return antiseptic
}
