import type { MessageRow, SqliteStorage, ThreadRow } from '../storage/sqlite.js'
import { parseJsonColumn } from '../storage/sqlite.js'
import { NotFoundError, ValidationError } from '../core/errors.js'
import { generateId } from '../core/ids.js'
import type { MessageRole, Thread, ThreadMessage, ThreadStatus } from '../core/types.js'
import { logger } from '../utils/logger.js'
import { isValidIdSegment } from '../utils/validation.js'

const log = logger.child('threads')

export interface NewMessage {
  role: MessageRole
  content: string
  metadata?: Record<string, unknown>
}

export interface ListThreadsOptions {
  userId?: string
  limit?: number
}

const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system']

export class ThreadManager {
  constructor(private db: SqliteStorage) {}

  /**
   * Returns the requested thread when it is active and belongs to this agent,
   * user and tenant. Anything else (unknown id, archived, foreign) gets a new
   * thread rather than an error.
   */
  getOrCreate(agentId: string, userId: string, tenantId: string, threadId?: string): Thread {
    if (threadId !== undefined) {
      const row = this.db.getThread(threadId)
      if (
        row
        && row.status === 'active'
        && row.agent_id === agentId
        && row.user_id === userId
        && row.tenant_id === tenantId
      ) {
        return rowToThread(row)
      }
      log.debug(`Thread ${threadId} not usable for agent ${agentId}, starting a new one`)
    }
    return this.create(agentId, userId, tenantId)
  }

  create(agentId: string, userId: string, tenantId: string): Thread {
    if (!isValidIdSegment(userId)) {
      throw new ValidationError(`Invalid user_id: ${JSON.stringify(userId)}`, ['user_id: must match [A-Za-z0-9._@-]{1,128}'])
    }
    const now = new Date()
    const row: ThreadRow = {
      id: generateId(),
      agent_id: agentId,
      user_id: userId,
      tenant_id: tenantId,
      title: defaultTitle(now),
      status: 'active',
      message_count: 0,
      last_message_at: null,
      created_at: now.toISOString(),
      updated_at: now.toISOString(),
    }
    this.db.insertThread(row)
    log.debug(`Created thread ${row.id} for agent ${agentId}`)
    return rowToThread(row)
  }

  get(threadId: string): Thread | null {
    const row = this.db.getThread(threadId)
    return row ? rowToThread(row) : null
  }

  list(tenantId: string, agentId: string, options: ListThreadsOptions = {}): Thread[] {
    const limit = Math.max(1, Math.min(options.limit ?? 50, 500))
    return this.db.listThreads(tenantId, agentId, options.userId, limit).map(rowToThread)
  }

  append(threadId: string, role: MessageRole, content: string, metadata: Record<string, unknown> = {}): ThreadMessage {
    return this.appendMany(threadId, [{ role, content, metadata }])[0]
  }

  /** Writes every message, or none, and keeps the thread counters in step. */
  appendMany(threadId: string, messages: NewMessage[]): ThreadMessage[] {
    if (messages.length === 0) return []
    return this.db.transaction(() => {
      if (!this.db.getThread(threadId)) {
        throw new NotFoundError(`Thread ${threadId} not found`)
      }
      const written: ThreadMessage[] = []
      let at = ''
      for (const message of messages) {
        at = new Date().toISOString()
        const row: MessageRow = {
          id: generateId(),
          thread_id: threadId,
          role: message.role,
          content: message.content,
          metadata: JSON.stringify(message.metadata ?? {}),
          created_at: at,
        }
        this.db.insertMessage(row)
        written.push(rowToMessage(row))
      }
      this.db.bumpThreadCounters(threadId, messages.length, at)
      return written
    })
  }

  /** The last `limit` messages, oldest first. */
  recent(threadId: string, limit: number): ThreadMessage[] {
    if (limit <= 0) return []
    return this.db.getRecentMessages(threadId, limit).map(rowToMessage)
  }

  archive(threadId: string): boolean {
    const row = this.db.getThread(threadId)
    if (!row || row.status === 'archived') return false
    return this.db.setThreadStatus(threadId, 'archived', new Date().toISOString())
  }

  /** Deletes the thread and, by cascade, its messages. */
  delete(threadId: string): boolean {
    return this.db.deleteThread(threadId)
  }
}

export function defaultTitle(at: Date): string {
  return `Conversation ${at.toISOString().slice(0, 16).replace('T', ' ')}`
}

function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some(r => r === value)
}

function parseStatus(value: string): ThreadStatus {
  return value === 'archived' ? 'archived' : 'active'
}

function rowToThread(row: ThreadRow): Thread {
  return {
    id: row.id,
    agent_id: row.agent_id,
    user_id: row.user_id,
    tenant_id: row.tenant_id,
    title: row.title,
    status: parseStatus(row.status),
    message_count: row.message_count,
    last_message_at: row.last_message_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

function rowToMessage(row: MessageRow): ThreadMessage {
  if (!isMessageRole(row.role)) {
    log.warn(`Message ${row.id} has unknown role ${row.role}, treating as system`)
  }
  return {
    id: row.id,
    thread_id: row.thread_id,
    role: isMessageRole(row.role) ? row.role : 'system',
    content: row.content,
    metadata: parseJsonColumn(row.metadata, {}),
    created_at: row.created_at,
  }
}
