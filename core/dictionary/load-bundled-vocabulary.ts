import { dirname, resolve, join } from 'node:path'
import { readFile, access } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'

import { VOCABULARY_PATH } from '../constants'

/**
 * Locates the bundled word list by walking up from this module's directory.
 * Works from the sources as well as from the built `dist/` tree.
 *
 * @param startDirectory - Directory to start from.
 * @returns Absolute path to the word list.
 */
export async function findBundledVocabulary(
  startDirectory: string = dirname(fileURLToPath(import.meta.url)),
): Promise<string> {
  let directory = resolve(startDirectory)
  for (;;) {
    let candidate = join(directory, VOCABULARY_PATH)
    try {
      await access(candidate)
      return candidate
    } catch {
      let parent = dirname(directory)
      if (parent === directory) {
        throw new Error(`Bundled dictionary not found: ${VOCABULARY_PATH}`)
      }
      directory = parent
    }
  }
}

/**
 * Reads the bundled vocabulary: one word per line, blank lines ignored.
 *
 * @param filePath - Word list to read. Defaults to the bundled one.
 * @returns Words in file order.
 */
export async function loadBundledVocabulary(
  filePath?: string,
): Promise<string[]> {
  let content = await readFile(
    filePath ?? (await findBundledVocabulary()),
    'utf8',
  )
  return content
    .split('\n')
    .map(word => word.trim())
    .filter(Boolean)
}
