import type { Config } from '../core/config.js'
import type { RetrievedMemory, ScoredEntry } from '../core/types.js'
import { clamp } from '../utils/validation.js'

export type ScoringWeights = Pick<Config, 'weightSimilarity' | 'weightRecency' | 'weightReinforcement' | 'decayRate'>

// Access count at which reinforcement saturates
const REINFORCEMENT_CEILING = 20

export function recencyScore(lastTouchedAt: string, now: Date, decayRate: number): number {
  const hoursSince = (now.getTime() - new Date(lastTouchedAt).getTime()) / 3600000
  if (!Number.isFinite(hoursSince)) return 0
  return Math.pow(decayRate, Math.max(0, hoursSince))
}

export function reinforcementScore(accessCount: number): number {
  if (accessCount <= 0) return 0
  return Math.min(1, Math.log1p(accessCount) / Math.log1p(REINFORCEMENT_CEILING))
}

/**
 * Hybrid ranking: wSim·similarity + wRec·decay^hours + wReinf·reinforcement.
 * Hours run from the last access, or creation if never accessed.
 */
export function scoreEntry(scored: ScoredEntry, weights: ScoringWeights, now: Date): RetrievedMemory {
  const { entry } = scored
  const similarity = clamp(scored.similarity, 0, 1)
  const recency = recencyScore(entry.last_accessed_at ?? entry.created_at, now, weights.decayRate)
  const reinforcement = reinforcementScore(entry.access_count)

  const score =
    weights.weightSimilarity * similarity +
    weights.weightRecency * recency +
    weights.weightReinforcement * reinforcement

  return {
    id: entry.id,
    namespace: entry.namespace,
    content: entry.content,
    memory_type: entry.memory_type,
    metadata: entry.metadata,
    similarity: scored.similarity,
    recency_score: recency,
    reinforcement_score: reinforcement,
    score,
    created_at: entry.created_at,
  }
}

export function rankEntries(entries: ScoredEntry[], weights: ScoringWeights, now: Date = new Date()): RetrievedMemory[] {
  return entries
    .map(e => scoreEntry(e, weights, now))
    .sort((a, b) => b.score - a.score
      || b.similarity - a.similarity
      || b.created_at.localeCompare(a.created_at)
      || b.id.localeCompare(a.id))
}
