import { describe, expect, it } from 'vitest'

import { normalizeMatchPath } from '../../core/filters/normalize-match-path'

describe('normalizeMatchPath', () => {
  it('drops leading ./ segments', () => {
    expect(normalizeMatchPath('./src/index.ts')).toBe('src/index.ts')
    expect(normalizeMatchPath('././src')).toBe('src')
  })

  it('converts backslashes', () => {
    expect(normalizeMatchPath(String.raw`src\lib\a.ts`)).toBe('src/lib/a.ts')
  })

  it('drops trailing slashes', () => {
    expect(normalizeMatchPath('build/')).toBe('build')
    expect(normalizeMatchPath('/')).toBe('/')
  })

  it('returns . for the current directory', () => {
    expect(normalizeMatchPath('')).toBe('.')
    expect(normalizeMatchPath('.')).toBe('.')
    expect(normalizeMatchPath('./')).toBe('.')
  })
})
