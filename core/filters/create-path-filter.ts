import picomatch from 'picomatch'

import type { PathFilter } from '../../types/path-filter'

import { normalizeMatchPath } from './normalize-match-path'
import { DEFAULT_EXCLUDE } from '../constants'

/**
 * Builds a filter from exclude patterns.
 *
 * A path is skipped when any pattern matches, with shell-glob semantics,
 * either the whole path or its last component. Dotfiles match and matching is
 * case-sensitive, so `.venv` prunes a `.venv` directory at any depth and
 * `*.pyc` matches by suffix anywhere.
 *
 * @param exclude - User patterns, added to the built-in ones.
 * @returns Path filter.
 */
export function createPathFilter(exclude: readonly string[]): PathFilter {
  let patterns = [
    ...new Set([
      ...DEFAULT_EXCLUDE,
      ...exclude.map(pattern => pattern.trim()).filter(Boolean),
    ]),
  ]

  let isMatch = picomatch(patterns, { dot: true })

  return Object.freeze({
    shouldSkip(path: string): boolean {
      let normalized = normalizeMatchPath(path)
      if (normalized === '.' || normalized === '..') {
        return false
      }

      let name = normalized.slice(normalized.lastIndexOf('/') + 1)
      return isMatch(normalized) || isMatch(name)
    },
    patterns,
  })
}
