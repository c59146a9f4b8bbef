import * as lancedb from '@lancedb/lancedb'
import { mkdirSync } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import type { Config } from '../core/config.js'
import { PersistenceError, ValidationError } from '../core/errors.js'
import { isValidUlid } from '../utils/validation.js'

export interface VectorRecord {
  memoryId: string
  namespace: string
  memoryType: string
  vector: number[]
  createdAt: string
}

export interface VectorSearchOptions {
  namespace: string
  includeDescendants: boolean
  limit: number
  memoryType?: string
}

export interface VectorHit {
  memory_id: string
  namespace: string
  similarity: number
}

/** Similarity index over memory embeddings. Rows themselves live in SQLite. */
export interface VectorIndex {
  add(record: VectorRecord): Promise<void>
  search(vector: number[], options: VectorSearchOptions): Promise<VectorHit[]>
  count(): Promise<number>
}

const hitSchema = z.object({
  memory_id: z.string(),
  namespace: z.string(),
  _distance: z.number().nullable().optional(),
})

interface LanceRow {
  [key: string]: unknown
  vector: number[]
  memory_id: string
  namespace: string
  memory_type: string
  created_at: string
}

// Namespaces and tags are built from validated segments, so no quote can reach the filter
export function namespaceFilter(namespace: string, includeDescendants: boolean): string {
  if (!includeDescendants) return `namespace = '${namespace}'`
  return `(namespace = '${namespace}' OR namespace LIKE '${namespace}:%')`
}

export class LanceStorage implements VectorIndex {
  private connection: Promise<lancedb.Connection>
  private table: Promise<lancedb.Table> | null = null
  private dimensions: number

  constructor(config: Config) {
    this.dimensions = config.embeddingDimensions
    const lanceDir = join(config.dataDir, 'lancedb')
    mkdirSync(lanceDir, { recursive: true })
    this.connection = lancedb.connect(lanceDir)
  }

  private async openTable(): Promise<lancedb.Table> {
    const db = await this.connection
    const tableNames = await db.tableNames()
    if (tableNames.includes('memories')) {
      return db.openTable('memories')
    }
    const seed: LanceRow = {
      vector: new Array<number>(this.dimensions).fill(0),
      memory_id: '__init__',
      namespace: '',
      memory_type: '',
      created_at: new Date().toISOString(),
    }
    const table = await db.createTable('memories', [seed])
    await table.delete("memory_id = '__init__'")
    return table
  }

  private ensureTable(): Promise<lancedb.Table> {
    if (!this.table) {
      this.table = this.openTable()
      this.table.catch(() => {
        this.table = null
      })
    }
    return this.table
  }

  async add(record: VectorRecord): Promise<void> {
    if (!isValidUlid(record.memoryId)) {
      throw new ValidationError(`Invalid memory ID format: ${record.memoryId}`)
    }
    if (record.vector.length !== this.dimensions) {
      throw new ValidationError(`Vector dimension mismatch: expected ${this.dimensions}, got ${record.vector.length}`)
    }
    const table = await this.ensureTable()
    const row: LanceRow = {
      vector: record.vector,
      memory_id: record.memoryId,
      namespace: record.namespace,
      memory_type: record.memoryType,
      created_at: record.createdAt,
    }
    try {
      await table.add([row])
    } catch (err) {
      throw new PersistenceError(`Failed to index memory ${record.memoryId}`, err)
    }
  }

  async search(vector: number[], options: VectorSearchOptions): Promise<VectorHit[]> {
    const table = await this.ensureTable()
    let filter = namespaceFilter(options.namespace, options.includeDescendants)
    if (options.memoryType !== undefined) {
      filter += ` AND memory_type = '${options.memoryType}'`
    }

    const rows: unknown[] = await table
      .vectorSearch(vector)
      .distanceType('cosine')
      .where(filter)
      .limit(options.limit)
      .toArray()

    const hits: VectorHit[] = []
    for (const row of rows) {
      const parsed = hitSchema.safeParse(row)
      if (!parsed.success) continue
      hits.push({
        memory_id: parsed.data.memory_id,
        namespace: parsed.data.namespace,
        similarity: 1 - (parsed.data._distance ?? 1),
      })
    }
    return hits
  }

  async count(): Promise<number> {
    const table = await this.ensureTable()
    return table.countRows()
  }
}
