import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, writeFile, mkdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { resolveConfig } from '../../core/config/resolve-config'
import { ConfigError } from '../../core/config/config-error'

describe('resolveConfig', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'antiseptic-config-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('uses defaults when no configuration file exists', async () => {
    let { config, file } = await resolveConfig(directory)

    expect(file).toBeNull()
    expect(config).toEqual({
      allowedWords: new Set(),
      minWordLength: 1,
      exclude: [],
    })
  })

  it('reads the tool.antiseptic table of pyproject.toml', async () => {
    await writeFile(
      join(directory, 'pyproject.toml'),
      [
        '[project]',
        'name = "demo"',
        '',
        '[tool.antiseptic]',
        'exclude = ["*.pyc", ".venv"]',
        'allowed-words = ["Glubbage"]',
      ].join('\n'),
    )

    let { config, file } = await resolveConfig(directory)

    expect(file).toBe('pyproject.toml')
    expect(config.exclude).toEqual(['*.pyc', '.venv'])
    expect(config.allowedWords).toEqual(new Set(['glubbage']))
  })

  it('reads the top-level table of antiseptic.toml', async () => {
    await writeFile(
      join(directory, 'antiseptic.toml'),
      'exclude = ["docs"]\nmin-word-length = 3\n',
    )

    let { config, file } = await resolveConfig(directory)

    expect(file).toBe('antiseptic.toml')
    expect(config.exclude).toEqual(['docs'])
    expect(config.minWordLength).toBe(3)
  })

  it('reads .antiseptic.toml', async () => {
    await writeFile(
      join(directory, '.antiseptic.toml'),
      'allowed-words = ["frobnicate"]\n',
    )

    let { config, file } = await resolveConfig(directory)

    expect(file).toBe('.antiseptic.toml')
    expect(config.allowedWords).toEqual(new Set(['frobnicate']))
  })

  it('prefers pyproject.toml over the other files', async () => {
    await writeFile(
      join(directory, 'pyproject.toml'),
      '[tool.antiseptic]\nexclude = ["from-pyproject"]\n',
    )
    await writeFile(
      join(directory, '.antiseptic.toml'),
      'exclude = ["from-hidden"]\n',
    )

    let { config } = await resolveConfig(directory)

    expect(config.exclude).toEqual(['from-pyproject'])
  })

  it('passes over a pyproject.toml without antiseptic settings', async () => {
    await writeFile(join(directory, 'pyproject.toml'), '[tool.ruff]\n')
    await writeFile(
      join(directory, 'antiseptic.toml'),
      'exclude = ["from-antiseptic"]\n',
    )

    let { config, file } = await resolveConfig(directory)

    expect(file).toBe('antiseptic.toml')
    expect(config.exclude).toEqual(['from-antiseptic'])
  })

  it('rejects mistyped settings with the offending key', async () => {
    await writeFile(
      join(directory, 'antiseptic.toml'),
      'exclude = ["*.pyc", 5]\n',
    )

    let error = await resolveConfig(directory).catch((error_: unknown) => error_)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ file: 'antiseptic.toml', key: 'exclude' })
  })

  it('rejects malformed TOML', async () => {
    await writeFile(join(directory, 'antiseptic.toml'), 'exclude = [\n')

    let error = await resolveConfig(directory).catch((error_: unknown) => error_)

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ file: 'antiseptic.toml' })
  })

  it('rejects a configuration path that cannot be read', async () => {
    await mkdir(join(directory, 'antiseptic.toml'))

    await expect(resolveConfig(directory)).rejects.toThrow(
      'Configuration file antiseptic.toml is not readable.',
    )
  })
})
