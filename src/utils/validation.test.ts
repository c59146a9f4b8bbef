import { describe, it, expect } from 'vitest'
import { isValidUlid, isValidIdSegment, isValidTag, isPlainObject, clamp } from './validation.js'
import { generateId } from '../core/ids.js'

describe('isValidUlid', () => {
  it('accepts valid ULIDs from generateId', () => {
    expect(isValidUlid(generateId())).toBe(true)
  })

  it('accepts lowercase ULIDs', () => {
    expect(isValidUlid('01arz3ndektsv4rrffq69g5fav')).toBe(true)
  })

  it('rejects wrong lengths', () => {
    expect(isValidUlid('')).toBe(false)
    expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FA')).toBe(false)
    expect(isValidUlid('01ARZ3NDEKTSV4RRFFQ69G5FAVX')).toBe(false)
  })

  it('rejects SQL injection attempts', () => {
    expect(isValidUlid("'; DROP TABLE memories; --")).toBe(false)
  })
})

describe('isValidIdSegment', () => {
  it('accepts ULIDs, UUIDs and simple handles', () => {
    expect(isValidIdSegment(generateId())).toBe(true)
    expect(isValidIdSegment('550e8400-e29b-41d4-a716-446655440000')).toBe(true)
    expect(isValidIdSegment('user@example.com')).toBe(true)
    expect(isValidIdSegment('T')).toBe(true)
  })

  it('rejects namespace separators and quotes', () => {
    expect(isValidIdSegment('tenant:agent')).toBe(false)
    expect(isValidIdSegment("a' OR 1=1")).toBe(false)
    expect(isValidIdSegment('a%')).toBe(false)
    expect(isValidIdSegment('')).toBe(false)
  })

  it('rejects overly long ids', () => {
    expect(isValidIdSegment('x'.repeat(129))).toBe(false)
  })
})

describe('isValidTag', () => {
  it('accepts word-like tags', () => {
    expect(isValidTag('conversation')).toBe(true)
    expect(isValidTag('user-preference_2')).toBe(true)
  })

  it('rejects punctuation', () => {
    expect(isValidTag("fact'")).toBe(false)
    expect(isValidTag('a b')).toBe(false)
  })
})

describe('isPlainObject', () => {
  it('distinguishes objects from arrays and null', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject('x')).toBe(false)
  })
})

describe('clamp', () => {
  it('returns value when within range', () => {
    expect(clamp(0.5, 0, 1)).toBe(0.5)
  })

  it('clamps to the bounds', () => {
    expect(clamp(-1, 0, 1)).toBe(0)
    expect(clamp(2, 0, 1)).toBe(1)
  })
})
