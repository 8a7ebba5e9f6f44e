import { describe, it, expect } from 'vitest'
import { ErrorCode, PmmError, isPmmError } from './errors'

describe('PmmError', () => {
  it('prints code, message and context', () => {
    const err = new PmmError(ErrorCode.UNKNOWN_FIELD, 'No field x', { field: 'x' })
    expect(err.toString()).toBe('PmmError [UnknownField]: No field x Context: {"field":"x"}')
  })

  it('omits the context when there is none', () => {
    expect(new PmmError(ErrorCode.TYPE_MISMATCH, 'bad').toString()).toBe('PmmError [TypeMismatch]: bad')
  })

  it('matches its own code', () => {
    const err = new PmmError(ErrorCode.DUPLICATE_FIELD_NAME, 'dup')
    expect(err.is(ErrorCode.DUPLICATE_FIELD_NAME)).toBe(true)
    expect(err.is(ErrorCode.UNKNOWN_FIELD)).toBe(false)
  })

  it('is recognised by the type guard', () => {
    expect(isPmmError(new PmmError(ErrorCode.TYPE_MISMATCH, 'bad'))).toBe(true)
    expect(isPmmError(new Error('bad'))).toBe(false)
  })
})
