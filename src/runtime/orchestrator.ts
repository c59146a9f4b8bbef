import type { Config } from '../core/config.js'
import {
  AgentRuntimeError,
  CancelledError,
  CompletionError,
  ProviderError,
  ProviderTimeoutError,
  ValidationError,
} from '../core/errors.js'
import { generateId } from '../core/ids.js'
import type { CompletionProvider, CompletionRequest, CompletionResult } from '../core/types.js'
import type { ContractStore } from '../contracts/store.js'
import type { MemoryManager } from '../memory/manager.js'
import type { TraitModulator } from '../modulation/trait-modulator.js'
import type { ThreadManager } from '../threads/manager.js'
import { KeyedLock } from '../utils/keyed-lock.js'
import { logger } from '../utils/logger.js'
import { withTimeout } from '../utils/timeout.js'
import { buildPrompt } from './prompt.js'

const log = logger.child('runtime')

export type OrchestratorConfig = Pick<Config, 'completionTimeoutMs' | 'completionRetry'>

export interface ProcessRequest {
  agentId: string
  tenantId: string
  userId: string
  userInput: string
  threadId?: string
  signal?: AbortSignal
}

export interface TurnMetadata {
  memory_confidence: number
  message_count: number
  retrieved_memories: number
  memory_stored: boolean
  model: string
}

export interface ProcessResult {
  thread_id: string
  response: string
  metadata: TurnMetadata
}

/**
 * One conversational turn end to end. Nothing is persisted until the
 * completion has succeeded; after that the thread append is required and the
 * memory write is best-effort.
 */
export class InteractionOrchestrator {
  private providers = new Map<string, CompletionProvider>()
  private locks = new KeyedLock()

  constructor(
    private contracts: ContractStore,
    private modulator: TraitModulator,
    private threads: ThreadManager,
    private memory: MemoryManager,
    providers: CompletionProvider[],
    private config: OrchestratorConfig,
  ) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider)
    }
  }

  async process(request: ProcessRequest): Promise<ProcessResult> {
    if (request.signal?.aborted) {
      throw new CancelledError('Turn cancelled')
    }
    if (request.userInput.trim().length === 0) {
      throw new ValidationError('User input must not be empty', ['user_input: must not be empty'])
    }
    // Only the lock key; a missing thread id always gets a fresh thread
    const lockKey = request.threadId ?? `new:${generateId()}`
    return this.locks.run(lockKey, () => this.turn(request))
  }

  private async turn(request: ProcessRequest): Promise<ProcessResult> {
    const contract = this.contracts.get(request.agentId, request.tenantId)
    const { configuration } = contract
    const provider = this.provider(configuration.llm_provider)

    const thread = this.threads.getOrCreate(contract.id, request.userId, contract.tenant_id, request.threadId)

    const context = await this.memory.assembleContext({
      tenantId: contract.tenant_id,
      agentId: contract.id,
      userInput: request.userInput,
      threadId: thread.id,
      userId: request.userId,
      k: configuration.memory_k,
      window: configuration.thread_window,
      memoryEnabled: configuration.memory_enabled,
      signal: request.signal,
    })

    const rendered = this.modulator.render(contract)
    const prompt = buildPrompt(rendered, context, request.userInput)

    const completion = await this.complete(provider, {
      model: configuration.llm_model,
      system: prompt.system,
      messages: prompt.messages,
      temperature: configuration.temperature,
      maxTokens: configuration.max_tokens,
    }, request.signal)

    const recorded = await this.memory.recordTurn({
      tenantId: contract.tenant_id,
      agentId: contract.id,
      threadId: thread.id,
      userInput: request.userInput,
      response: completion.text,
      userId: request.userId,
      memoryEnabled: configuration.memory_enabled,
      assistantMetadata: {
        model: completion.model,
        input_tokens: completion.input_tokens,
        output_tokens: completion.output_tokens,
        memory_confidence: context.confidence,
      },
    })

    try {
      this.contracts.recordInteraction(contract.id)
    } catch (err) {
      log.warn(`Failed to record interaction for agent ${contract.id}`, {
        error: err instanceof Error ? err.message : String(err),
      })
    }

    const messageCount = this.threads.get(thread.id)?.message_count ?? thread.message_count + recorded.messages.length
    log.debug(`Turn complete for agent ${contract.id} on thread ${thread.id}`, {
      retrieved: context.retrieved.length,
      memory_stored: recorded.memoryId !== null,
    })

    return {
      thread_id: thread.id,
      response: completion.text,
      metadata: {
        memory_confidence: context.confidence,
        message_count: messageCount,
        retrieved_memories: context.retrieved.length,
        memory_stored: recorded.memoryId !== null,
        model: completion.model,
      },
    }
  }

  private provider(name: string): CompletionProvider {
    const provider = this.providers.get(name)
    if (!provider) {
      throw new ProviderError(`No completion provider registered for "${name}"`, undefined, 'PROVIDER_NOT_FOUND', false)
    }
    return provider
  }

  private async complete(
    provider: CompletionProvider,
    request: Omit<CompletionRequest, 'signal'>,
    signal: AbortSignal | undefined,
  ): Promise<CompletionResult> {
    const attempt = async (): Promise<CompletionResult> => {
      try {
        return await withTimeout(
          s => provider.complete({ ...request, signal: s }),
          this.config.completionTimeoutMs,
          'Completion',
          signal,
        )
      } catch (err) {
        if (err instanceof AgentRuntimeError) throw err
        throw new CompletionError(`Completion failed: ${err instanceof Error ? err.message : String(err)}`, err)
      }
    }

    try {
      return await attempt()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      if (
        !this.config.completionRetry
        || !(err instanceof ProviderError)
        || !err.retryable
        || err instanceof ProviderTimeoutError
      ) {
        throw err
      }
      log.warn(`Completion failed, retrying once: ${message}`)
      return attempt()
    }
  }
}
