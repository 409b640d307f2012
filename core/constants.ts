/** Configuration files searched for, in order of precedence. */
export const CONFIG_FILES = [
  'pyproject.toml',
  'antiseptic.toml',
  '.antiseptic.toml',
] as const

/** File whose configuration lives in a `[tool.antiseptic]` table. */
export const PYPROJECT_FILE = 'pyproject.toml'

/** Name of the table inside `[tool]` holding the configuration. */
export const TOOL_TABLE = 'antiseptic'

/** Code attached to every spelling diagnostic. */
export const DIAGNOSTIC_CODE = 'AS001'

/** Bundled vocabulary, relative to the package root. */
export const VOCABULARY_PATH = 'assets/dictionaries/en.txt'

/**
 * Patterns that are always excluded: version control metadata, dependency
 * and build directories, caches, lock files and compiled artifacts.
 */
export const DEFAULT_EXCLUDE = [
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '.venv',
  'venv',
  '__pycache__',
  '.mypy_cache',
  '.ruff_cache',
  '.pytest_cache',
  '.cache',
  'target',
  'dist',
  'build',
  'coverage',
  '*.lock',
  'package-lock.json',
  '*.pyc',
  '*.so',
  '*.tar.gz',
  '*.whl',
  '*.min.js',
] as const
