import { describe, expect, it } from 'vitest'

import { getToolTable } from '../../core/config/get-tool-table'
import { ConfigError } from '../../core/config/config-error'

describe('getToolTable', () => {
  it('returns the antiseptic table', () => {
    expect(
      getToolTable(
        { tool: { antiseptic: { exclude: ['*.pyc'] }, ruff: {} } },
        'pyproject.toml',
      ),
    ).toEqual({ exclude: ['*.pyc'] })
  })

  it('returns null when the file does not configure antiseptic', () => {
    expect(getToolTable({}, 'pyproject.toml')).toBeNull()
    expect(getToolTable({ tool: { ruff: {} } }, 'pyproject.toml')).toBeNull()
  })

  it('rejects a tool setting that is not a table', () => {
    expect(() => getToolTable({ tool: 'antiseptic' }, 'pyproject.toml')).toThrow(
      ConfigError,
    )
  })

  it('rejects an antiseptic setting that is not a table', () => {
    expect(() =>
      getToolTable({ tool: { antiseptic: ['*.pyc'] } }, 'pyproject.toml'),
    ).toThrow('Setting "tool.antiseptic" in pyproject.toml should be a table.')
  })
})
