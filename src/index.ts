export { loadConfig, BUILTIN_TRAIT_DEFAULTS } from './core/config.js'
export type { Config, ConfigOverrides } from './core/config.js'
export * from './core/errors.js'
export * from './core/types.js'

export { ContractStore } from './contracts/store.js'
export type { GetOptions, ListOptions, UpdateOptions, ArchiveOptions } from './contracts/store.js'
export { ContractValidator } from './contracts/validator.js'
export type { CheckResult, RepairResult, ValidationSummary, ValidateAllOptions } from './contracts/validator.js'
export type { CreateAgentInput, ContractPatch } from './contracts/schema.js'
export { TraitModulator } from './modulation/trait-modulator.js'

export { Namespace } from './memory/namespace.js'
export { MemoryStore } from './memory/store.js'
export { MemoryManager } from './memory/manager.js'
export { ThreadManager } from './threads/manager.js'

export { AnthropicCompletionProvider } from './completion/anthropic-provider.js'
export { OpenAIEmbeddingProvider } from './embeddings/openai-provider.js'
export { SqliteStorage } from './storage/sqlite.js'
export { LanceStorage } from './storage/lance.js'
export type { VectorIndex } from './storage/lance.js'

export { InteractionOrchestrator } from './runtime/orchestrator.js'
export type { ProcessRequest, ProcessResult, TurnMetadata } from './runtime/orchestrator.js'
export { createRuntime, openRuntime } from './runtime/runtime.js'
export type { AgentRuntime, RuntimeDependencies } from './runtime/runtime.js'
export { BackgroundScheduler } from './background/scheduler.js'
export { createMcpServer, startMcpServer } from './mcp/server.js'
