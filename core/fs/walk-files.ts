import type { Stats } from 'node:fs'

import { readdir, lstat, stat } from 'node:fs/promises'
import { relative, resolve, join } from 'node:path'

import type { PathFilter } from '../../types/path-filter'

import { hasErrorCode } from '../guards/has-error-code'

/** Options for walking file trees. */
interface WalkFilesOptions {
  /** Filter deciding which files and directories are left out. */
  filter: PathFilter

  /** Directory that relative roots are resolved against. */
  cwd: string
}

/**
 * Lazily walks root paths depth-first and yields the regular files found.
 *
 * Directory entries are visited in sorted order. Excluded directories are
 * pruned without being read. Symbolic links inside the tree are not followed;
 * a root that is a symbolic link is resolved. A file reached from more than
 * one root is yielded once.
 *
 * Yielded values are display paths: each root as given, joined with entry
 * names (so `.` yields `src/index.ts` rather than `./src/index.ts`). The
 * filter always sees paths relative to `cwd`, so a root given as an absolute
 * path is filtered like the same root given relatively.
 *
 * @param roots - Files or directories to walk, relative to `cwd` or absolute.
 * @param options - Walk options.
 * @yields Display paths of regular files.
 */
export async function* walkFiles(
  roots: readonly string[],
  options: WalkFilesOptions,
): AsyncGenerator<string> {
  let { filter, cwd } = options
  let seen = new Set<string>()

  async function* walk(directory: string): AsyncGenerator<string> {
    let entries = await readdir(resolve(cwd, directory))
    entries.sort()

    for (let entry of entries) {
      let path = join(directory, entry)
      let absolute = resolve(cwd, path)
      if (filter.shouldSkip(relative(cwd, absolute))) {
        continue
      }

      let info: Stats
      try {
        info = await lstat(absolute)
      } catch {
        /** Entry vanished or is inaccessible. */
        continue
      }

      if (info.isSymbolicLink()) {
        continue
      }

      if (info.isDirectory()) {
        if (!seen.has(absolute)) {
          seen.add(absolute)
          yield* walk(path)
        }
      } else if (info.isFile() && !seen.has(absolute)) {
        seen.add(absolute)
        yield path
      }
    }
  }

  for (let root of roots) {
    let absolute = resolve(cwd, root)
    let info = await stat(absolute).catch((error: unknown) => {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new Error(`Path not found: ${root}`, { cause: error })
      }
      throw error
    })

    if (filter.shouldSkip(relative(cwd, absolute)) || seen.has(absolute)) {
      continue
    }

    if (info.isDirectory()) {
      seen.add(absolute)
      yield* walk(root)
    } else if (info.isFile()) {
      seen.add(absolute)
      yield join(root)
    }
  }
}
