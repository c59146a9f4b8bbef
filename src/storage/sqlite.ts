import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname, join } from 'path'
import type { Config } from '../core/config.js'
import { stateKeys } from '../core/constants.js'
import { ConflictError, PersistenceError } from '../core/errors.js'
import type { RuntimeStats } from '../core/types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('sqlite')

const SCHEMA_VERSION = 1

export interface AgentRow {
  id: string
  tenant_id: string
  owner_id: string
  name: string
  type: string
  status: string
  version: string
  payload: string
  tags: string
  interaction_count: number
  last_interaction_at: string | null
  created_at: string
  updated_at: string
}

export type NewAgentRow = Omit<AgentRow, 'interaction_count' | 'last_interaction_at'>

export interface AgentWrite {
  name: string
  type: string
  status: string
  version: string
  payload: string
  tags: string
  updated_at: string
}

export interface AgentQuery {
  tenantId?: string
  status?: string
  type?: string
  tag?: string
  includeArchived: boolean
  limit: number
  offset: number
}

export interface ContractVersionRow {
  id: string
  agent_id: string
  version: string
  payload: string
  change_summary: string | null
  created_by: string
  created_at: string
}

export interface RenderedPromptRow {
  agent_id: string
  version: string
  system_prompt: string
  directives: string
  rendered_at: string
}

export interface ThreadRow {
  id: string
  agent_id: string
  user_id: string
  tenant_id: string
  title: string
  status: string
  message_count: number
  last_message_at: string | null
  created_at: string
  updated_at: string
}

export interface MessageRow {
  id: string
  thread_id: string
  role: string
  content: string
  metadata: string
  created_at: string
}

export interface MemoryRow {
  id: string
  namespace: string
  tenant_id: string
  agent_id: string
  content: string
  content_hash: string
  memory_type: string
  metadata: string
  access_count: number
  last_accessed_at: string | null
  created_at: string
  updated_at: string
}

interface CountRow {
  c: number
}

/**
 * The single durable store. Higher layers own the semantics; this class owns
 * the SQL. All multi-statement writes go through `transaction`, which is
 * synchronous, so nothing else in the process can interleave with it.
 */
export class SqliteStorage {
  private db: Database.Database

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true })
    }
    this.db = new Database(dbPath)
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL')
      this.db.pragma('busy_timeout = 5000')
      this.db.pragma('wal_autocheckpoint = 1000')
    }
    this.db.pragma('foreign_keys = ON')
    this.migrate()
  }

  static fromConfig(config: Config): SqliteStorage {
    return new SqliteStorage(join(config.dataDir, 'runtime.db'))
  }

  static inMemory(): SqliteStorage {
    return new SqliteStorage(':memory:')
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS agents (
        id TEXT PRIMARY KEY,
        tenant_id TEXT NOT NULL,
        owner_id TEXT NOT NULL,
        name TEXT NOT NULL,
        type TEXT NOT NULL,
        status TEXT NOT NULL,
        version TEXT NOT NULL,
        payload TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '[]',
        interaction_count INTEGER NOT NULL DEFAULT 0,
        last_interaction_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_agents_tenant_status ON agents(tenant_id, status);
      CREATE INDEX IF NOT EXISTS idx_agents_owner ON agents(owner_id);

      CREATE TABLE IF NOT EXISTS contract_versions (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
        version TEXT NOT NULL,
        payload TEXT NOT NULL,
        change_summary TEXT,
        created_by TEXT NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE(agent_id, version)
      );

      CREATE TABLE IF NOT EXISTS rendered_prompts (
        agent_id TEXT PRIMARY KEY REFERENCES agents(id) ON DELETE CASCADE,
        version TEXT NOT NULL,
        system_prompt TEXT NOT NULL,
        directives TEXT NOT NULL,
        rendered_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS threads (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
        user_id TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        title TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        message_count INTEGER NOT NULL DEFAULT 0,
        last_message_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_threads_tenant_agent ON threads(tenant_id, agent_id);
      CREATE INDEX IF NOT EXISTS idx_threads_agent_user ON threads(agent_id, user_id);

      CREATE TABLE IF NOT EXISTS thread_messages (
        id TEXT PRIMARY KEY,
        thread_id TEXT NOT NULL REFERENCES threads(id) ON DELETE CASCADE,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_thread_time ON thread_messages(thread_id, created_at);

      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        namespace TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        content TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        memory_type TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        access_count INTEGER NOT NULL DEFAULT 0,
        last_accessed_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(namespace, content_hash)
      );

      CREATE INDEX IF NOT EXISTS idx_memories_tenant_agent ON memories(tenant_id, agent_id);
      CREATE INDEX IF NOT EXISTS idx_memories_namespace ON memories(namespace);

      CREATE TABLE IF NOT EXISTS state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `)

    const existing = this.db.prepare<[], { version: number }>(
      'SELECT version FROM schema_version ORDER BY version DESC LIMIT 1',
    ).get()
    if (!existing) {
      this.db.prepare<[number]>('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION)
    }
  }

  // --- Agents ---

  insertAgent(row: NewAgentRow): void {
    try {
      this.db.prepare<[string, string, string, string, string, string, string, string, string, string, string]>(`
        INSERT INTO agents (id, tenant_id, owner_id, name, type, status, version, payload, tags, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        row.id,
        row.tenant_id,
        row.owner_id,
        row.name,
        row.type,
        row.status,
        row.version,
        row.payload,
        row.tags,
        row.created_at,
        row.updated_at,
      )
    } catch (err) {
      throw wrapWriteError('Failed to insert agent', err)
    }
  }

  getAgent(id: string): AgentRow | null {
    return this.db.prepare<[string], AgentRow>('SELECT * FROM agents WHERE id = ?').get(id) ?? null
  }

  listAgents(query: AgentQuery): AgentRow[] {
    let sql = 'SELECT * FROM agents WHERE 1 = 1'
    const params: Array<string | number> = []

    if (query.tenantId !== undefined) {
      sql += ' AND tenant_id = ?'
      params.push(query.tenantId)
    }
    if (query.status !== undefined) {
      sql += ' AND status = ?'
      params.push(query.status)
    } else if (!query.includeArchived) {
      sql += " AND status != 'archived'"
    }
    if (query.type !== undefined) {
      sql += ' AND type = ?'
      params.push(query.type)
    }
    if (query.tag !== undefined) {
      sql += ' AND EXISTS (SELECT 1 FROM json_each(agents.tags) WHERE json_each.value = ?)'
      params.push(query.tag)
    }

    sql += ' ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?'
    params.push(query.limit, query.offset)

    return this.db.prepare<Array<string | number>, AgentRow>(sql).all(...params)
  }

  // Compare-and-swap on version; false means another writer got there first
  updateAgentIfVersion(id: string, expectedVersion: string, write: AgentWrite): boolean {
    const result = this.db.prepare<[string, string, string, string, string, string, string, string, string]>(`
      UPDATE agents
      SET name = ?, type = ?, status = ?, version = ?, payload = ?, tags = ?, updated_at = ?
      WHERE id = ? AND version = ?
    `).run(
      write.name,
      write.type,
      write.status,
      write.version,
      write.payload,
      write.tags,
      write.updated_at,
      id,
      expectedVersion,
    )
    return result.changes > 0
  }

  recordAgentInteraction(id: string, at: string): boolean {
    const result = this.db.prepare<[string, string]>(`
      UPDATE agents SET interaction_count = interaction_count + 1, last_interaction_at = ? WHERE id = ?
    `).run(at, id)
    return result.changes > 0
  }

  getAgentIds(tenantId?: string): string[] {
    if (tenantId !== undefined) {
      return this.db.prepare<[string], { id: string }>(
        "SELECT id FROM agents WHERE tenant_id = ? AND status != 'archived' ORDER BY created_at, rowid",
      ).all(tenantId).map(r => r.id)
    }
    return this.db.prepare<[], { id: string }>(
      "SELECT id FROM agents WHERE status != 'archived' ORDER BY created_at, rowid",
    ).all().map(r => r.id)
  }

  // --- Contract Versions ---

  insertContractVersion(row: ContractVersionRow): void {
    try {
      this.db.prepare<[string, string, string, string, string | null, string, string]>(`
        INSERT INTO contract_versions (id, agent_id, version, payload, change_summary, created_by, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        row.id,
        row.agent_id,
        row.version,
        row.payload,
        row.change_summary,
        row.created_by,
        row.created_at,
      )
    } catch (err) {
      throw wrapWriteError(`Failed to snapshot version ${row.version} of agent ${row.agent_id}`, err)
    }
  }

  getContractVersions(agentId: string): ContractVersionRow[] {
    return this.db.prepare<[string], ContractVersionRow>(
      'SELECT * FROM contract_versions WHERE agent_id = ? ORDER BY created_at ASC, rowid ASC',
    ).all(agentId)
  }

  // --- Rendered Prompts ---

  upsertRenderedPrompt(row: RenderedPromptRow): void {
    this.db.prepare<[string, string, string, string, string]>(`
      INSERT INTO rendered_prompts (agent_id, version, system_prompt, directives, rendered_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(agent_id)
      DO UPDATE SET
        version = excluded.version,
        system_prompt = excluded.system_prompt,
        directives = excluded.directives,
        rendered_at = excluded.rendered_at
    `).run(row.agent_id, row.version, row.system_prompt, row.directives, row.rendered_at)
  }

  getRenderedPrompt(agentId: string): RenderedPromptRow | null {
    return this.db.prepare<[string], RenderedPromptRow>(
      'SELECT * FROM rendered_prompts WHERE agent_id = ?',
    ).get(agentId) ?? null
  }

  deleteRenderedPrompt(agentId: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM rendered_prompts WHERE agent_id = ?').run(agentId).changes > 0
  }

  // --- Threads ---

  insertThread(row: ThreadRow): void {
    try {
      this.db.prepare<[string, string, string, string, string, string, number, string | null, string, string]>(`
        INSERT INTO threads (id, agent_id, user_id, tenant_id, title, status, message_count, last_message_at, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        row.id,
        row.agent_id,
        row.user_id,
        row.tenant_id,
        row.title,
        row.status,
        row.message_count,
        row.last_message_at,
        row.created_at,
        row.updated_at,
      )
    } catch (err) {
      throw wrapWriteError('Failed to insert thread', err)
    }
  }

  getThread(id: string): ThreadRow | null {
    return this.db.prepare<[string], ThreadRow>('SELECT * FROM threads WHERE id = ?').get(id) ?? null
  }

  listThreads(tenantId: string, agentId: string, userId: string | undefined, limit: number): ThreadRow[] {
    if (userId !== undefined) {
      return this.db.prepare<[string, string, string, number], ThreadRow>(`
        SELECT * FROM threads WHERE tenant_id = ? AND agent_id = ? AND user_id = ?
        ORDER BY updated_at DESC, rowid DESC LIMIT ?
      `).all(tenantId, agentId, userId, limit)
    }
    return this.db.prepare<[string, string, number], ThreadRow>(`
      SELECT * FROM threads WHERE tenant_id = ? AND agent_id = ?
      ORDER BY updated_at DESC, rowid DESC LIMIT ?
    `).all(tenantId, agentId, limit)
  }

  bumpThreadCounters(id: string, added: number, at: string): boolean {
    const result = this.db.prepare<[number, string, string, string]>(`
      UPDATE threads SET message_count = message_count + ?, last_message_at = ?, updated_at = ? WHERE id = ?
    `).run(added, at, at, id)
    return result.changes > 0
  }

  setThreadStatus(id: string, status: string, at: string): boolean {
    return this.db.prepare<[string, string, string]>(
      'UPDATE threads SET status = ?, updated_at = ? WHERE id = ?',
    ).run(status, at, id).changes > 0
  }

  deleteThread(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM threads WHERE id = ?').run(id).changes > 0
  }

  // --- Messages ---

  insertMessage(row: MessageRow): void {
    try {
      this.db.prepare<[string, string, string, string, string, string]>(`
        INSERT INTO thread_messages (id, thread_id, role, content, metadata, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(row.id, row.thread_id, row.role, row.content, row.metadata, row.created_at)
    } catch (err) {
      throw wrapWriteError('Failed to insert message', err)
    }
  }

  // Most recent `limit` messages, returned oldest-first. rowid breaks timestamp ties in insertion order.
  getRecentMessages(threadId: string, limit: number): MessageRow[] {
    return this.db.prepare<[string, number], MessageRow>(`
      SELECT id, thread_id, role, content, metadata, created_at FROM (
        SELECT rowid AS seq, * FROM thread_messages WHERE thread_id = ?
        ORDER BY created_at DESC, rowid DESC LIMIT ?
      ) ORDER BY created_at ASC, seq ASC
    `).all(threadId, limit)
  }

  countMessages(threadId: string): number {
    return this.count('SELECT COUNT(*) as c FROM thread_messages WHERE thread_id = ?', threadId)
  }

  // --- Memories ---

  insertMemory(row: MemoryRow): void {
    try {
      this.db.prepare<[string, string, string, string, string, string, string, string, number, string | null, string, string]>(`
        INSERT INTO memories (id, namespace, tenant_id, agent_id, content, content_hash, memory_type, metadata, access_count, last_accessed_at, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        row.id,
        row.namespace,
        row.tenant_id,
        row.agent_id,
        row.content,
        row.content_hash,
        row.memory_type,
        row.metadata,
        row.access_count,
        row.last_accessed_at,
        row.created_at,
        row.updated_at,
      )
    } catch (err) {
      throw wrapWriteError('Failed to insert memory', err)
    }
  }

  getMemory(id: string): MemoryRow | null {
    return this.db.prepare<[string], MemoryRow>('SELECT * FROM memories WHERE id = ?').get(id) ?? null
  }

  findMemoryByHash(namespace: string, contentHash: string): MemoryRow | null {
    return this.db.prepare<[string, string], MemoryRow>(
      'SELECT * FROM memories WHERE namespace = ? AND content_hash = ?',
    ).get(namespace, contentHash) ?? null
  }

  getMemoriesByIds(ids: string[]): Map<string, MemoryRow> {
    if (ids.length === 0) return new Map()
    const placeholders = ids.map(() => '?').join(',')
    const rows = this.db.prepare<string[], MemoryRow>(
      `SELECT * FROM memories WHERE id IN (${placeholders})`,
    ).all(...ids)
    const map = new Map<string, MemoryRow>()
    for (const row of rows) {
      map.set(row.id, row)
    }
    return map
  }

  touchMemory(id: string, at: string): boolean {
    return this.db.prepare<[string, string, string]>(`
      UPDATE memories SET access_count = access_count + 1, last_accessed_at = ?, updated_at = ? WHERE id = ?
    `).run(at, at, id).changes > 0
  }

  deleteMemory(id: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM memories WHERE id = ?').run(id).changes > 0
  }

  // Exact namespace or any descendant; substr avoids LIKE wildcards in ids
  countMemories(namespace?: string): number {
    if (namespace === undefined) {
      return this.count('SELECT COUNT(*) as c FROM memories')
    }
    const prefix = `${namespace}:`
    return this.db.prepare<[string, number, string], CountRow>(
      'SELECT COUNT(*) as c FROM memories WHERE namespace = ? OR substr(namespace, 1, ?) = ?',
    ).get(namespace, prefix.length, prefix)?.c ?? 0
  }

  countMemoriesExact(namespace: string): number {
    return this.count('SELECT COUNT(*) as c FROM memories WHERE namespace = ?', namespace)
  }

  // --- State ---

  setState(key: string, value: string): void {
    this.db.prepare<[string, string]>('INSERT OR REPLACE INTO state (key, value) VALUES (?, ?)').run(key, value)
  }

  getState(key: string): string | null {
    return this.db.prepare<[string], { value: string }>('SELECT value FROM state WHERE key = ?').get(key)?.value ?? null
  }

  // --- Stats ---

  getStats(): RuntimeStats {
    const row = this.db.prepare<[], Omit<RuntimeStats, 'last_validation_at'>>(`
      SELECT
        (SELECT COUNT(*) FROM agents WHERE status != 'archived') as agent_count,
        (SELECT COUNT(*) FROM agents WHERE status = 'archived') as archived_agent_count,
        (SELECT COUNT(*) FROM contract_versions) as version_count,
        (SELECT COUNT(*) FROM threads) as thread_count,
        (SELECT COUNT(*) FROM thread_messages) as message_count,
        (SELECT COUNT(*) FROM memories) as memory_count,
        (SELECT COUNT(*) FROM rendered_prompts) as cached_prompt_count
    `).get()

    return {
      agent_count: row?.agent_count ?? 0,
      archived_agent_count: row?.archived_agent_count ?? 0,
      version_count: row?.version_count ?? 0,
      thread_count: row?.thread_count ?? 0,
      message_count: row?.message_count ?? 0,
      memory_count: row?.memory_count ?? 0,
      cached_prompt_count: row?.cached_prompt_count ?? 0,
      last_validation_at: this.getState(stateKeys.lastValidationAt),
    }
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)()
  }

  close(): void {
    this.db.close()
  }

  private count(sql: string, ...params: string[]): number {
    return this.db.prepare<string[], CountRow>(sql).get(...params)?.c ?? 0
  }
}

function wrapWriteError(message: string, err: unknown): ConflictError | PersistenceError {
  const detail = err instanceof Error ? err.message : String(err)
  if (err instanceof Database.SqliteError
    && (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
    return new ConflictError(`${message}: ${detail}`, err)
  }
  log.warn(message, { error: detail })
  return new PersistenceError(`${message}: ${detail}`, err)
}

export function parseJsonColumn(value: string, fallback: Record<string, unknown>): Record<string, unknown> {
  if (!value) return fallback
  try {
    const parsed: unknown = JSON.parse(value)
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : fallback
  } catch (err) {
    log.warn('JSON parse failed in row converter, using fallback', { value: value.slice(0, 100), error: err })
    return fallback
  }
}
