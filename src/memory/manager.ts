import type { Config } from '../core/config.js'
import { CONVERSATION_MEMORY_TYPE } from '../core/constants.js'
import { CancelledError } from '../core/errors.js'
import type { EmbeddingProvider, MemoryContext, RetrievedMemory, ScoredEntry, ThreadMessage } from '../core/types.js'
import { assertDimensions } from '../embeddings/provider.js'
import type { ThreadManager } from '../threads/manager.js'
import { logger } from '../utils/logger.js'
import { withTimeout } from '../utils/timeout.js'
import { Namespace } from './namespace.js'
import { rankEntries } from './scoring.js'
import type { MemoryStore, UpsertResult } from './store.js'

const log = logger.child('memory')

export type MemoryManagerConfig = Pick<
  Config,
  'embeddingTimeoutMs' | 'userMemoryLimit' | 'decayRate' | 'weightSimilarity' | 'weightRecency' | 'weightReinforcement'
>

export interface AssembleContextParams {
  tenantId: string
  agentId: string
  userInput: string
  threadId: string
  userId?: string
  k: number
  window: number
  memoryEnabled?: boolean
  signal?: AbortSignal
}

export interface RecordTurnParams {
  tenantId: string
  agentId: string
  threadId: string
  userInput: string
  response: string
  userId?: string
  assistantMetadata?: Record<string, unknown>
  memoryEnabled?: boolean
}

export interface RecordedTurn {
  messages: ThreadMessage[]
  memoryId: string | null
}

export interface RememberParams {
  tenantId: string
  agentId: string
  content: string
  userId?: string
  memoryType?: string
  metadata?: Record<string, unknown>
}

export interface SearchParams {
  tenantId: string
  agentId: string
  query: string
  limit: number
  userId?: string
  memoryType?: string
}

/**
 * Stateless coordinator over the memory store and thread manager. Memory is
 * best-effort: retrieval and derived-memory writes degrade instead of failing
 * the turn, while thread appends are never swallowed.
 */
export class MemoryManager {
  constructor(
    private store: MemoryStore,
    private threads: ThreadManager,
    private embeddings: EmbeddingProvider,
    private config: MemoryManagerConfig,
  ) {}

  async assembleContext(params: AssembleContextParams): Promise<MemoryContext> {
    const retrieved = params.memoryEnabled === false ? [] : await this.retrieve(params)
    const recent = this.readRecent(params.threadId, params.window)
    const confidence = retrieved.length === 0
      ? 0
      : retrieved.reduce((sum, m) => sum + m.similarity, 0) / retrieved.length
    return { retrieved, recent, confidence }
  }

  async recordTurn(params: RecordTurnParams): Promise<RecordedTurn> {
    const messages = this.threads.appendMany(params.threadId, [
      { role: 'user', content: params.userInput },
      { role: 'assistant', content: params.response, metadata: params.assistantMetadata },
    ])

    if (params.memoryEnabled === false) {
      return { messages, memoryId: null }
    }

    try {
      const content = `User: ${params.userInput}\nAssistant: ${params.response}`
      const embedding = await this.embed(content)
      const result = await this.store.upsert({
        namespace: Namespace.agent(params.tenantId, params.agentId),
        content,
        embedding,
        memoryType: CONVERSATION_MEMORY_TYPE,
        metadata: {
          thread_id: params.threadId,
          ...(params.userId !== undefined ? { user_id: params.userId } : {}),
        },
      })
      return { messages, memoryId: result.id }
    } catch (err) {
      log.warn(`Failed to store conversation memory for agent ${params.agentId}`, {
        error: err instanceof Error ? err.message : String(err),
      })
      return { messages, memoryId: null }
    }
  }

  /** Stores an explicit memory for the agent, or for one of its users. Errors propagate. */
  async remember(params: RememberParams): Promise<UpsertResult> {
    const namespace = params.userId !== undefined
      ? Namespace.user(params.tenantId, params.agentId, params.userId)
      : Namespace.agent(params.tenantId, params.agentId)
    const embedding = await this.embed(params.content)
    return this.store.upsert({
      namespace,
      content: params.content,
      embedding,
      memoryType: params.memoryType ?? 'fact',
      metadata: params.metadata,
    })
  }

  /** Scored retrieval without touching entries. Errors propagate. */
  async search(params: SearchParams): Promise<RetrievedMemory[]> {
    const namespace = params.userId !== undefined
      ? Namespace.user(params.tenantId, params.agentId, params.userId)
      : Namespace.agent(params.tenantId, params.agentId)
    const embedding = await this.embed(params.query)
    const hits = await this.store.search(namespace, embedding, params.limit, { memoryType: params.memoryType })
    return rankEntries(hits, this.config)
  }

  private async retrieve(params: AssembleContextParams): Promise<RetrievedMemory[]> {
    try {
      const embedding = await this.embed(params.userInput, params.signal)

      const agentHits = await this.store.search(
        Namespace.agent(params.tenantId, params.agentId),
        embedding,
        params.k,
        { includeDescendants: false },
      )
      let userHits: ScoredEntry[] = []
      if (params.userId !== undefined) {
        userHits = await this.store.search(
          Namespace.user(params.tenantId, params.agentId, params.userId),
          embedding,
          Math.min(this.config.userMemoryLimit, params.k),
        )
      }

      const union = new Map<string, ScoredEntry>()
      for (const hit of [...agentHits, ...userHits]) {
        if (!union.has(hit.entry.id)) union.set(hit.entry.id, hit)
      }

      const ranked = rankEntries([...union.values()], this.config)
      for (const memory of ranked) {
        this.store.touch(memory.id)
      }
      return ranked
    } catch (err) {
      if (err instanceof CancelledError) throw err
      log.warn(`Memory retrieval failed for agent ${params.agentId}, continuing without memories`, {
        error: err instanceof Error ? err.message : String(err),
      })
      return []
    }
  }

  private readRecent(threadId: string, window: number): ThreadMessage[] {
    try {
      return this.threads.recent(threadId, window)
    } catch (err) {
      log.warn(`Failed to read recent messages for thread ${threadId}`, {
        error: err instanceof Error ? err.message : String(err),
      })
      return []
    }
  }

  private async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const vector = await withTimeout(
      timeoutSignal => this.embeddings.embed(text, timeoutSignal),
      this.config.embeddingTimeoutMs,
      'Embedding',
      signal,
    )
    assertDimensions(vector, this.embeddings.dimensions(), 'Embedding')
    return vector
  }
}
