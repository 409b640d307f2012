import { resolve } from 'node:path'

import type { SkippedFile } from '../../types/skipped-file'
import type { Dictionary } from '../../types/dictionary'
import type { Diagnostic } from '../../types/diagnostic'

import { readTextFile } from '../fs/read-text-file'
import { checkText } from './check-text'

/** Options for checking a stream of files. */
export interface CheckFilesOptions {
  /** Called for each file left unchecked because of its content. */
  onSkippedFile?(skipped: SkippedFile): void

  /** Tokens shorter than this many characters are not reported. */
  minWordLength?: number

  /** Known words, shared by every file. */
  dictionary: Dictionary

  /** Directory that display paths are relative to. */
  cwd: string
}

/**
 * Spell-checks files one after another.
 *
 * Each file's diagnostics are produced together, in line then column order.
 * Files that cannot be read, look binary or are not valid UTF-8 are skipped
 * without a diagnostic.
 *
 * @param files - Display paths, e.g. from `walkFiles`.
 * @param options - Check options.
 * @yields Diagnostics, file by file.
 */
export async function* checkFiles(
  files: AsyncIterable<string> | Iterable<string>,
  options: CheckFilesOptions,
): AsyncGenerator<Diagnostic> {
  let { onSkippedFile, minWordLength, dictionary, cwd } = options

  for await (let path of files) {
    let result = await readTextFile(resolve(cwd, path))
    if (!result.ok) {
      onSkippedFile?.({ reason: result.reason, path })
      continue
    }

    yield* checkText(path, result.content, { minWordLength, dictionary })
  }
}
