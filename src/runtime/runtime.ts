import type { Config } from '../core/config.js'
import type { CompletionProvider, EmbeddingProvider } from '../core/types.js'
import { AnthropicCompletionProvider } from '../completion/anthropic-provider.js'
import { contractDefaultsFromConfig } from '../contracts/schema.js'
import { ContractStore } from '../contracts/store.js'
import { ContractValidator } from '../contracts/validator.js'
import { OpenAIEmbeddingProvider } from '../embeddings/openai-provider.js'
import { MemoryManager } from '../memory/manager.js'
import { MemoryStore } from '../memory/store.js'
import { TraitModulator } from '../modulation/trait-modulator.js'
import { LanceStorage } from '../storage/lance.js'
import type { VectorIndex } from '../storage/lance.js'
import { SqliteStorage } from '../storage/sqlite.js'
import { ThreadManager } from '../threads/manager.js'
import { InteractionOrchestrator } from './orchestrator.js'

export interface RuntimeDependencies {
  db: SqliteStorage
  vectors: VectorIndex
  embeddings: EmbeddingProvider
  completions: CompletionProvider[]
}

export interface AgentRuntime {
  config: Config
  db: SqliteStorage
  vectors: VectorIndex
  modulator: TraitModulator
  contracts: ContractStore
  validator: ContractValidator
  threads: ThreadManager
  memories: MemoryStore
  memory: MemoryManager
  orchestrator: InteractionOrchestrator
  close(): void
}

export function createRuntime(config: Config, deps: RuntimeDependencies): AgentRuntime {
  const modulator = new TraitModulator()
  const contracts = new ContractStore(deps.db, modulator, contractDefaultsFromConfig(config))
  const validator = new ContractValidator(deps.db, modulator)
  const threads = new ThreadManager(deps.db)
  const memories = new MemoryStore(deps.db, deps.vectors, deps.embeddings.dimensions())
  const memory = new MemoryManager(memories, threads, deps.embeddings, config)
  const orchestrator = new InteractionOrchestrator(contracts, modulator, threads, memory, deps.completions, config)

  return {
    config,
    db: deps.db,
    vectors: deps.vectors,
    modulator,
    contracts,
    validator,
    threads,
    memories,
    memory,
    orchestrator,
    close: () => deps.db.close(),
  }
}

/** Production wiring: SQLite and LanceDB under `dataDir`, HTTP embeddings, Anthropic completions. */
export function openRuntime(config: Config): AgentRuntime {
  return createRuntime(config, {
    db: SqliteStorage.fromConfig(config),
    vectors: new LanceStorage(config),
    embeddings: new OpenAIEmbeddingProvider({
      apiKey: config.embeddingApiKey,
      baseUrl: config.embeddingBaseUrl,
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
    }),
    completions: [new AnthropicCompletionProvider(config.anthropicApiKey)],
  })
}
