import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import {
  findBundledVocabulary,
  loadBundledVocabulary,
} from '../../core/dictionary/load-bundled-vocabulary'

describe('loadBundledVocabulary', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'antiseptic-vocabulary-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('finds the bundled word list from the module directory', async () => {
    let path = await findBundledVocabulary()

    expect(path.endsWith(join('assets', 'dictionaries', 'en.txt'))).toBeTruthy()
  })

  it('loads the bundled word list', async () => {
    let words = await loadBundledVocabulary()

    expect(words).toContain('hello')
    expect(words).toContain('world')
    expect(words).not.toContain('helol')
  })

  it('reads one word per line and skips blank lines', async () => {
    let path = join(directory, 'words.txt')
    await writeFile(path, 'alpha\n\n  beta  \r\ngamma\n')

    await expect(loadBundledVocabulary(path)).resolves.toEqual([
      'alpha',
      'beta',
      'gamma',
    ])
  })

  it('fails when no word list exists above the start directory', async () => {
    await expect(findBundledVocabulary(directory)).rejects.toThrow(
      'Bundled dictionary not found',
    )
  })
})
