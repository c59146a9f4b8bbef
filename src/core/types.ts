export const TRAIT_NAMES = [
  'confidence',
  'empathy',
  'creativity',
  'discipline',
  'assertiveness',
  'humor',
  'formality',
  'verbosity',
  'supportiveness',
  'spirituality',
  'technicality',
  'safety',
] as const

export type TraitName = typeof TRAIT_NAMES[number]

export type AgentTraits = Record<TraitName, number>

export type AgentType = 'conversational' | 'voice' | 'workflow' | 'autonomous'

export type AgentStatus = 'active' | 'inactive' | 'archived'

export interface AgentIdentity {
  short_description: string
  full_description: string
  character_role: string
  mission: string
  interaction_style: string
}

export interface AgentConfiguration {
  llm_provider: string
  llm_model: string
  temperature: number
  max_tokens: number
  memory_enabled: boolean
  voice_enabled: boolean
  tools_enabled: boolean
  memory_k: number
  thread_window: number
}

export interface VoiceConfiguration {
  provider: string
  voice_id: string
  language: string
  speed: number
  pitch: number
  stability: number
  similarity_boost: number
  stt_provider: string
  stt_model: string
  stt_language: string
  vad_enabled: boolean
}

export interface AgentContract {
  id: string
  tenant_id: string
  owner_id: string
  name: string
  type: AgentType
  version: string
  status: AgentStatus
  identity: AgentIdentity
  traits: AgentTraits
  configuration: AgentConfiguration
  voice: VoiceConfiguration | null
  tags: string[]
  created_at: string
  updated_at: string
}

export interface AgentRecord {
  contract: AgentContract
  interaction_count: number
  last_interaction_at: string | null
}

export interface ContractVersion {
  id: string
  agent_id: string
  version: string
  contract: AgentContract
  change_summary: string | null
  created_by: string
  created_at: string
}

export type TraitBand = 'low' | 'moderate' | 'high' | 'very_high'

export interface TraitDirective {
  trait: TraitName
  label: string
  value: number
  band: TraitBand
  instructions: string[]
}

export interface RenderedPrompt {
  system_prompt: string
  directives: TraitDirective[]
}

export interface CachedPrompt extends RenderedPrompt {
  agent_id: string
  version: string
  rendered_at: string
}

export interface MemoryEntry {
  id: string
  namespace: string
  tenant_id: string
  agent_id: string
  content: string
  content_hash: string
  memory_type: string
  metadata: Record<string, unknown>
  access_count: number
  last_accessed_at: string | null
  created_at: string
  updated_at: string
}

export interface ScoredEntry {
  entry: MemoryEntry
  similarity: number
}

export interface RetrievedMemory {
  id: string
  namespace: string
  content: string
  memory_type: string
  metadata: Record<string, unknown>
  similarity: number
  recency_score: number
  reinforcement_score: number
  score: number
  created_at: string
}

export type ThreadStatus = 'active' | 'archived'

export interface Thread {
  id: string
  agent_id: string
  user_id: string
  tenant_id: string
  title: string
  status: ThreadStatus
  message_count: number
  last_message_at: string | null
  created_at: string
  updated_at: string
}

export type MessageRole = 'user' | 'assistant' | 'system'

export interface ThreadMessage {
  id: string
  thread_id: string
  role: MessageRole
  content: string
  metadata: Record<string, unknown>
  created_at: string
}

export interface MemoryContext {
  retrieved: RetrievedMemory[]
  recent: ThreadMessage[]
  confidence: number
}

export interface RuntimeStats {
  agent_count: number
  archived_agent_count: number
  version_count: number
  thread_count: number
  message_count: number
  memory_count: number
  cached_prompt_count: number
  last_validation_at: string | null
}

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>
  dimensions(): number
}

export interface CompletionMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface CompletionRequest {
  model: string
  system: string
  messages: CompletionMessage[]
  temperature: number
  maxTokens: number
  signal?: AbortSignal
}

export interface CompletionResult {
  text: string
  model: string
  input_tokens: number | null
  output_tokens: number | null
}

export interface CompletionProvider {
  readonly name: string
  complete(request: CompletionRequest): Promise<CompletionResult>
}
