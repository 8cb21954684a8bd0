import { describe, it, expect } from 'vitest'
import { Ok, Err, LurkError } from '../../src/common/index.js'

describe('Result', () => {
  it('Ok wraps a value', () => {
    const result = Ok({ projectName: 'svc' })
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.projectName).toBe('svc')
  })

  it('Err wraps an error', () => {
    const error = LurkError.validation('bad config')
    const result = Err(error)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBe(error)
  })
})

describe('LurkError', () => {
  it('validation carries its code', () => {
    const error = LurkError.validation('missing field')
    expect(error.name).toBe('LurkError')
    expect(error.code).toBe('VALIDATION_ERROR')
    expect(error.message).toBe('missing field')
  })

  it('io keeps the underlying cause', () => {
    const cause = new Error('EBADF')
    const error = LurkError.io('stderr', cause)
    expect(error.code).toBe('IO_ERROR')
    expect(error.message).toBe('failed to write to stderr: EBADF')
    expect(error.cause).toBe(cause)
  })

  it('format names the template', () => {
    const error = LurkError.format('%d items', new TypeError('expecting number'))
    expect(error.code).toBe('FORMAT_ERROR')
    expect(error.message).toBe('cannot format "%d items": expecting number')
  })

  it('io describes non-Error causes', () => {
    expect(LurkError.io('stdout', 'closed').message).toBe('failed to write to stdout: closed')
  })
})
