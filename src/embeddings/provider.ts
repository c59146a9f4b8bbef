import type { EmbeddingProvider } from '../core/types.js'
import { EmbeddingError } from '../core/errors.js'

export type { EmbeddingProvider }

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(`Dimension mismatch in cosineSimilarity: ${a.length} vs ${b.length}`)
  }
  let dotProduct = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB)
  return denominator === 0 ? 0 : dotProduct / denominator
}

export function assertDimensions(vector: number[], expected: number, label: string): void {
  if (vector.length !== expected) {
    throw new EmbeddingError(`${label}: expected ${expected} dimensions, got ${vector.length}`)
  }
  if (vector.some(v => !Number.isFinite(v))) {
    throw new EmbeddingError(`${label}: vector contains non-finite values`)
  }
}
