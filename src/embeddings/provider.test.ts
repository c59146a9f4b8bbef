import { describe, it, expect } from 'vitest'
import { assertDimensions, cosineSimilarity } from './provider.js'
import { EmbeddingError } from '../core/errors.js'

describe('cosineSimilarity', () => {
  it('returns 1.0 for identical vectors', () => {
    const v = [1, 2, 3, 4, 5]
    expect(cosineSimilarity(v, v)).toBeCloseTo(1.0)
  })

  it('returns 0.0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBeCloseTo(0.0)
  })

  it('returns -1.0 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [-1, 0, 0])).toBeCloseTo(-1.0)
  })

  it('throws on different-length vectors', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(EmbeddingError)
  })

  it('returns 0 for zero vectors', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0)
  })

  it('is scale invariant', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1.0)
  })
})

describe('assertDimensions', () => {
  it('accepts a vector of the expected length', () => {
    expect(() => assertDimensions([0.1, 0.2], 2, 'query')).not.toThrow()
  })

  it('rejects a wrong length', () => {
    expect(() => assertDimensions([0.1], 2, 'query')).toThrow('query: expected 2 dimensions, got 1')
  })

  it('rejects NaN components', () => {
    expect(() => assertDimensions([0.1, NaN], 2, 'query')).toThrow('non-finite')
  })
})
