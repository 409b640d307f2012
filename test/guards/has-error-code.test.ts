import { describe, expect, it } from 'vitest'

import { hasErrorCode } from '../../core/guards/has-error-code'

describe('hasErrorCode', () => {
  it('matches errors carrying the code', () => {
    let error = Object.assign(new Error('missing'), { code: 'ENOENT' })

    expect(hasErrorCode(error, 'ENOENT')).toBeTruthy()
    expect(hasErrorCode(error, 'EACCES')).toBeFalsy()
  })

  it('returns false for errors without a code and for non-errors', () => {
    expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBeFalsy()
    expect(hasErrorCode({ code: 'ENOENT' }, 'ENOENT')).toBeFalsy()
    expect(hasErrorCode(null, 'ENOENT')).toBeFalsy()
  })
})
