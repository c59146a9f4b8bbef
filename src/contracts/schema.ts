import { z } from 'zod'
import type { Config } from '../core/config.js'
import { ValidationError } from '../core/errors.js'
import type {
  AgentConfiguration,
  AgentContract,
  AgentIdentity,
  AgentStatus,
  AgentTraits,
  AgentType,
  VoiceConfiguration,
} from '../core/types.js'
import { isValidIdSegment, isValidTag } from '../utils/validation.js'
import { isSemver } from '../utils/version.js'

export const AGENT_TYPES = ['conversational', 'voice', 'workflow', 'autonomous'] as const
export const AGENT_STATUSES = ['active', 'inactive', 'archived'] as const

export interface ContractDefaults {
  traits: AgentTraits
  llmProvider: string
  llmModel: string
  memoryK: number
  threadWindow: number
}

export function contractDefaultsFromConfig(config: Config): ContractDefaults {
  return {
    traits: { ...config.traitDefaults },
    llmProvider: 'anthropic',
    llmModel: config.defaultModel,
    memoryK: config.memoryK,
    threadWindow: config.threadWindow,
  }
}

export const VOICE_DEFAULTS: Omit<VoiceConfiguration, 'voice_id'> = {
  provider: 'elevenlabs',
  language: 'en-US',
  speed: 1.0,
  pitch: 1.0,
  stability: 0.75,
  similarity_boost: 0.75,
  stt_provider: 'deepgram',
  stt_model: 'nova-2',
  stt_language: 'en',
  vad_enabled: true,
}

const idSegment = z.string().refine(isValidIdSegment, 'must match [A-Za-z0-9._@-]{1,128}')
const traitValue = z.number().int().min(0).max(100)
const tag = z.string().refine(isValidTag, 'must match [A-Za-z0-9_-]{1,64}')

const identityShape = {
  short_description: z.string().trim().min(1).max(100),
  full_description: z.string(),
  character_role: z.string(),
  mission: z.string(),
  interaction_style: z.string(),
}

const configurationShape = {
  llm_provider: z.string().min(1),
  llm_model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().min(50).max(4000),
  memory_enabled: z.boolean(),
  voice_enabled: z.boolean(),
  tools_enabled: z.boolean(),
  memory_k: z.number().int().min(1).max(20),
  thread_window: z.number().int().min(5).max(50),
}

const voiceShape = {
  provider: z.string().min(1),
  voice_id: z.string().min(1),
  language: z.string().min(1),
  speed: z.number().min(0.5).max(2),
  pitch: z.number().min(0.5).max(2),
  stability: z.number().min(0).max(1),
  similarity_boost: z.number().min(0).max(1),
  stt_provider: z.string().min(1),
  stt_model: z.string().min(1),
  stt_language: z.string().min(1),
  vad_enabled: z.boolean(),
}

const traitsSchema = z.object({
  confidence: traitValue,
  empathy: traitValue,
  creativity: traitValue,
  discipline: traitValue,
  assertiveness: traitValue,
  humor: traitValue,
  formality: traitValue,
  verbosity: traitValue,
  supportiveness: traitValue,
  spirituality: traitValue,
  technicality: traitValue,
  safety: traitValue,
})

function requireVoiceForVoiceAgents(
  contract: { type: AgentType; voice?: VoiceConfiguration | null },
  ctx: z.RefinementCtx,
): void {
  if (contract.type === 'voice' && !contract.voice) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['voice'],
      message: 'Voice agents must have voice configuration',
    })
  }
}

/** Shape of a stored contract. Every field is present; no defaults apply. */
export const agentContractSchema: z.ZodType<AgentContract> = z.object({
  id: idSegment,
  tenant_id: idSegment,
  owner_id: idSegment,
  name: z.string().trim().min(1).max(200),
  type: z.enum(AGENT_TYPES),
  version: z.string().refine(isSemver, 'must be a semantic version'),
  status: z.enum(AGENT_STATUSES),
  identity: z.object(identityShape),
  traits: traitsSchema,
  configuration: z.object(configurationShape),
  voice: z.object(voiceShape).nullable(),
  tags: z.array(tag),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
}).superRefine(requireVoiceForVoiceAgents)

function createInputSchema(defaults: ContractDefaults) {
  const t = defaults.traits
  return z.object({
    id: idSegment.optional(),
    tenant_id: idSegment,
    owner_id: idSegment,
    name: z.string().trim().min(1).max(200),
    type: z.enum(AGENT_TYPES).default('conversational'),
    status: z.enum(['active', 'inactive']).default('active'),
    identity: z.object({
      short_description: identityShape.short_description,
      full_description: z.string().default(''),
      character_role: z.string().default(''),
      mission: z.string().default(''),
      interaction_style: z.string().default(''),
    }),
    traits: z.object({
      confidence: traitValue.default(t.confidence),
      empathy: traitValue.default(t.empathy),
      creativity: traitValue.default(t.creativity),
      discipline: traitValue.default(t.discipline),
      assertiveness: traitValue.default(t.assertiveness),
      humor: traitValue.default(t.humor),
      formality: traitValue.default(t.formality),
      verbosity: traitValue.default(t.verbosity),
      supportiveness: traitValue.default(t.supportiveness),
      spirituality: traitValue.default(t.spirituality),
      technicality: traitValue.default(t.technicality),
      safety: traitValue.default(t.safety),
    }).default({}),
    configuration: z.object({
      llm_provider: configurationShape.llm_provider.default(defaults.llmProvider),
      llm_model: configurationShape.llm_model.default(defaults.llmModel),
      temperature: configurationShape.temperature.default(0.7),
      max_tokens: configurationShape.max_tokens.default(500),
      memory_enabled: z.boolean().default(true),
      voice_enabled: z.boolean().default(false),
      tools_enabled: z.boolean().default(false),
      memory_k: configurationShape.memory_k.default(defaults.memoryK),
      thread_window: configurationShape.thread_window.default(defaults.threadWindow),
    }).default({}),
    voice: z.object({
      provider: voiceShape.provider.default(VOICE_DEFAULTS.provider),
      voice_id: voiceShape.voice_id,
      language: voiceShape.language.default(VOICE_DEFAULTS.language),
      speed: voiceShape.speed.default(VOICE_DEFAULTS.speed),
      pitch: voiceShape.pitch.default(VOICE_DEFAULTS.pitch),
      stability: voiceShape.stability.default(VOICE_DEFAULTS.stability),
      similarity_boost: voiceShape.similarity_boost.default(VOICE_DEFAULTS.similarity_boost),
      stt_provider: voiceShape.stt_provider.default(VOICE_DEFAULTS.stt_provider),
      stt_model: voiceShape.stt_model.default(VOICE_DEFAULTS.stt_model),
      stt_language: voiceShape.stt_language.default(VOICE_DEFAULTS.stt_language),
      vad_enabled: voiceShape.vad_enabled.default(VOICE_DEFAULTS.vad_enabled),
    }).nullable().optional(),
    tags: z.array(tag).default([]),
  }).superRefine(requireVoiceForVoiceAgents)
}

const patchShape = {
  name: z.string().trim().min(1).max(200).optional(),
  type: z.enum(AGENT_TYPES).optional(),
  status: z.enum(['active', 'inactive']).optional(),
  identity: z.object(identityShape).partial().optional(),
  traits: traitsSchema.partial().optional(),
  configuration: z.object(configurationShape).partial().optional(),
  voice: z.object(voiceShape).partial().nullable().optional(),
  tags: z.array(tag).optional(),
}

const patchSchema = z.object(patchShape).strict()

/** Argument shapes for tool surfaces. The store still applies defaults and the full checks. */
export const createAgentArgs = {
  id: idSegment.optional(),
  tenant_id: idSegment,
  owner_id: idSegment,
  name: z.string(),
  type: z.enum(AGENT_TYPES).optional(),
  status: z.enum(['active', 'inactive']).optional(),
  identity: z.object(identityShape).partial().extend({ short_description: z.string() }),
  traits: traitsSchema.partial().optional(),
  configuration: z.object(configurationShape).partial().optional(),
  voice: z.object(voiceShape).partial().extend({ voice_id: z.string() }).nullable().optional(),
  tags: z.array(tag).optional(),
}

export const contractPatchArgs = patchShape

export interface CreateAgentInput {
  id?: string
  tenant_id: string
  owner_id: string
  name: string
  type?: AgentType
  status?: Exclude<AgentStatus, 'archived'>
  identity: Partial<AgentIdentity> & { short_description: string }
  traits?: Partial<AgentTraits>
  configuration?: Partial<AgentConfiguration>
  voice?: (Partial<VoiceConfiguration> & { voice_id: string }) | null
  tags?: string[]
}

export interface ContractPatch {
  name?: string
  type?: AgentType
  status?: Exclude<AgentStatus, 'archived'>
  identity?: Partial<AgentIdentity>
  traits?: Partial<AgentTraits>
  configuration?: Partial<AgentConfiguration>
  voice?: Partial<VoiceConfiguration> | null
  tags?: string[]
}

export type ParsedCreateInput = z.output<ReturnType<typeof createInputSchema>>

function toValidationError(message: string, error: z.ZodError): ValidationError {
  const issues = error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
  return new ValidationError(`${message}: ${issues.join('; ')}`, issues)
}

export function parseCreateInput(input: unknown, defaults: ContractDefaults): ParsedCreateInput {
  const result = createInputSchema(defaults).safeParse(input)
  if (!result.success) {
    throw toValidationError('Invalid agent contract', result.error)
  }
  return result.data
}

export function parsePatch(patch: unknown): ContractPatch {
  const result = patchSchema.safeParse(patch)
  if (!result.success) {
    throw toValidationError('Invalid contract update', result.error)
  }
  return result.data
}

export function parseContract(value: unknown): AgentContract {
  const result = agentContractSchema.safeParse(value)
  if (!result.success) {
    throw toValidationError('Invalid agent contract', result.error)
  }
  return result.data
}

/**
 * Deep-merges a patch onto a contract. `voice: null` removes the voice block;
 * a partial voice block merges onto the current one, or onto the defaults
 * when there is none. The result is re-validated as a whole.
 */
export function applyPatch(current: AgentContract, patch: ContractPatch): AgentContract {
  let voice: unknown = current.voice
  if (patch.voice === null) {
    voice = null
  } else if (patch.voice !== undefined) {
    voice = { ...(current.voice ?? VOICE_DEFAULTS), ...patch.voice }
  }

  return parseContract({
    ...current,
    name: patch.name ?? current.name,
    type: patch.type ?? current.type,
    status: patch.status ?? current.status,
    identity: { ...current.identity, ...patch.identity },
    traits: { ...current.traits, ...patch.traits },
    configuration: { ...current.configuration, ...patch.configuration },
    voice,
    tags: patch.tags ?? current.tags,
  })
}

export function describePatch(patch: ContractPatch): string {
  const fields = Object.entries(patch)
    .filter(([, v]) => v !== undefined)
    .map(([k]) => k)
  return fields.length > 0 ? `Updated ${fields.join(', ')}` : 'No field changes'
}
