import type { MemoryRow, SqliteStorage } from '../storage/sqlite.js'
import { parseJsonColumn } from '../storage/sqlite.js'
import type { VectorHit, VectorIndex } from '../storage/lance.js'
import { PersistenceError, ValidationError } from '../core/errors.js'
import { contentHash, generateId } from '../core/ids.js'
import type { MemoryEntry, ScoredEntry } from '../core/types.js'
import { logger } from '../utils/logger.js'
import { isValidTag } from '../utils/validation.js'
import type { Namespace } from './namespace.js'

const log = logger.child('memory')

export interface NewMemory {
  namespace: Namespace
  content: string
  embedding: number[]
  memoryType: string
  metadata?: Record<string, unknown>
}

export interface UpsertResult {
  id: string
  created: boolean
}

export interface SearchOptions {
  memoryType?: string
  includeDescendants?: boolean
}

// LIKE treats `_` in ids as a wildcard; fetch extra so the exact re-check still fills `limit`
const DESCENDANT_OVERFETCH = 2

/**
 * Long-term memory. Rows and metadata live in SQLite, embeddings in the vector
 * index; a row only exists once its vector has been indexed.
 */
export class MemoryStore {
  constructor(
    private db: SqliteStorage,
    private index: VectorIndex,
    private dimensions: number,
  ) {}

  async put(memory: NewMemory): Promise<string> {
    this.validate(memory)
    const hash = contentHash(memory.content)
    return this.insert(memory, hash)
  }

  /** Inserts unless the namespace already holds the same content, which is then reinforced. */
  async upsert(memory: NewMemory): Promise<UpsertResult> {
    this.validate(memory)
    const hash = contentHash(memory.content)
    const existing = this.db.findMemoryByHash(memory.namespace.key, hash)
    if (existing) {
      this.touch(existing.id)
      return { id: existing.id, created: false }
    }
    return { id: await this.insert(memory, hash), created: true }
  }

  async search(
    namespace: Namespace,
    queryEmbedding: number[],
    limit: number,
    options: SearchOptions = {},
  ): Promise<ScoredEntry[]> {
    this.checkLength(queryEmbedding)
    if (limit <= 0) return []
    if (options.memoryType !== undefined && !isValidTag(options.memoryType)) {
      throw new ValidationError(`Invalid memory type: ${options.memoryType}`)
    }
    const includeDescendants = options.includeDescendants ?? true

    // The index orders ties arbitrarily, so widen the window until every hit
    // tied with the last kept one has been seen
    let window = includeDescendants ? limit * DESCENDANT_OVERFETCH : limit
    for (;;) {
      const hits = await this.index.search(queryEmbedding, {
        namespace: namespace.key,
        includeDescendants,
        limit: window,
        memoryType: options.memoryType,
      })
      const results = this.hydrate(hits, namespace, includeDescendants, options.memoryType)
      const exhausted = hits.length < window
      if (exhausted || (results.length >= limit && hits[hits.length - 1].similarity < results[limit - 1].similarity)) {
        return results.slice(0, limit)
      }
      window *= 2
    }
  }

  touch(id: string): boolean {
    return this.db.touchMemory(id, new Date().toISOString())
  }

  get(id: string): MemoryEntry | null {
    const row = this.db.getMemory(id)
    return row ? rowToEntry(row) : null
  }

  /** Entries in `namespace` and beneath it, or everywhere when omitted. */
  count(namespace?: Namespace): number {
    return this.db.countMemories(namespace?.key)
  }

  private hydrate(
    hits: VectorHit[],
    namespace: Namespace,
    includeDescendants: boolean,
    memoryType: string | undefined,
  ): ScoredEntry[] {
    const rows = this.db.getMemoriesByIds(hits.map(h => h.memory_id))
    const results: ScoredEntry[] = []
    for (const hit of hits) {
      const row = rows.get(hit.memory_id)
      if (!row) {
        log.warn(`Vector record has no matching memory row: ${hit.memory_id}`)
        continue
      }
      if (!namespace.contains(row.namespace, includeDescendants)) continue
      if (memoryType !== undefined && row.memory_type !== memoryType) continue
      results.push({ entry: rowToEntry(row), similarity: hit.similarity })
    }

    return results.sort((a, b) => b.similarity - a.similarity
      || b.entry.created_at.localeCompare(a.entry.created_at)
      || b.entry.id.localeCompare(a.entry.id))
  }

  private async insert(memory: NewMemory, hash: string): Promise<string> {
    const id = generateId()
    const now = new Date().toISOString()
    this.db.insertMemory({
      id,
      namespace: memory.namespace.key,
      tenant_id: memory.namespace.tenantId,
      agent_id: memory.namespace.agentId,
      content: memory.content,
      content_hash: hash,
      memory_type: memory.memoryType,
      metadata: JSON.stringify(memory.metadata ?? {}),
      access_count: 0,
      last_accessed_at: null,
      created_at: now,
      updated_at: now,
    })

    try {
      await this.index.add({
        memoryId: id,
        namespace: memory.namespace.key,
        memoryType: memory.memoryType,
        vector: memory.embedding,
        createdAt: now,
      })
    } catch (err) {
      this.db.deleteMemory(id)
      throw err instanceof PersistenceError || err instanceof ValidationError
        ? err
        : new PersistenceError(`Failed to index memory ${id}`, err)
    }
    return id
  }

  private validate(memory: NewMemory): void {
    if (memory.content.trim().length === 0) {
      throw new ValidationError('Memory content must not be empty', ['content: must not be empty'])
    }
    if (!isValidTag(memory.memoryType)) {
      throw new ValidationError(`Invalid memory type: ${memory.memoryType}`, [
        'memory_type: must match [A-Za-z0-9_-]{1,64}',
      ])
    }
    this.checkLength(memory.embedding)
  }

  private checkLength(embedding: number[]): void {
    if (embedding.length !== this.dimensions) {
      throw new ValidationError(
        `Embedding dimension mismatch: expected ${this.dimensions}, got ${embedding.length}`,
        [`embedding: expected ${this.dimensions} dimensions`],
      )
    }
  }
}

export function rowToEntry(row: MemoryRow): MemoryEntry {
  return {
    id: row.id,
    namespace: row.namespace,
    tenant_id: row.tenant_id,
    agent_id: row.agent_id,
    content: row.content,
    content_hash: row.content_hash,
    memory_type: row.memory_type,
    metadata: parseJsonColumn(row.metadata, {}),
    access_count: row.access_count,
    last_accessed_at: row.last_accessed_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}
