import { config as loadDotenv } from 'dotenv'
import { resolve } from 'path'
import type { LogLevel } from '../utils/logger.js'
import { logger } from '../utils/logger.js'
import { TRAIT_NAMES } from './types.js'
import type { AgentTraits } from './types.js'

loadDotenv()

export const BUILTIN_TRAIT_DEFAULTS: AgentTraits = {
  confidence: 70,
  empathy: 50,
  creativity: 50,
  discipline: 50,
  assertiveness: 50,
  humor: 30,
  formality: 50,
  verbosity: 50,
  supportiveness: 50,
  spirituality: 30,
  technicality: 50,
  safety: 80,
}

export interface Config {
  dataDir: string
  embeddingModel: string
  embeddingBaseUrl: string | null
  embeddingApiKey: string | null
  embeddingDimensions: number
  embeddingTimeoutMs: number
  completionTimeoutMs: number
  completionRetry: boolean
  anthropicApiKey: string | null
  defaultModel: string
  memoryK: number
  threadWindow: number
  userMemoryLimit: number
  decayRate: number
  weightSimilarity: number
  weightRecency: number
  weightReinforcement: number
  validationInterval: number
  autoRepair: boolean
  traitDefaults: AgentTraits
  logLevel: LogLevel
}

function envFloat(key: string, fallback: number): number {
  const val = process.env[key]
  if (val === undefined) return fallback
  const parsed = parseFloat(val)
  return isNaN(parsed) ? fallback : parsed
}

function envInt(key: string, fallback: number): number {
  const val = process.env[key]
  if (val === undefined) return fallback
  const parsed = parseInt(val, 10)
  return isNaN(parsed) ? fallback : parsed
}

function envString(key: string, fallback: string): string {
  return process.env[key] || fallback
}

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key]?.toLowerCase()
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return fallback
}

function envTraitDefaults(): AgentTraits {
  const traits = { ...BUILTIN_TRAIT_DEFAULTS }
  for (const name of TRAIT_NAMES) {
    traits[name] = envInt(`TRAIT_DEFAULT_${name.toUpperCase()}`, BUILTIN_TRAIT_DEFAULTS[name])
  }
  return traits
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

export interface ConfigOverrides extends Partial<Omit<Config, 'logLevel' | 'traitDefaults'>> {
  logLevel?: string
  traitDefaults?: Partial<AgentTraits>
}

export function loadConfig(overrides?: ConfigOverrides): Config {
  const envLogLevel = envString('LOG_LEVEL', 'info')
  const base: Omit<Config, 'logLevel'> & { logLevel: string } = {
    dataDir: resolve(envString('DATA_DIR', './data')),
    embeddingModel: envString('EMBEDDING_MODEL', 'text-embedding-3-small'),
    embeddingBaseUrl: process.env['EMBEDDING_BASE_URL'] || null,
    embeddingApiKey: process.env['EMBEDDING_API_KEY'] || process.env['OPENAI_API_KEY'] || null,
    embeddingDimensions: envInt('EMBEDDING_DIMENSIONS', 1536),
    embeddingTimeoutMs: envInt('EMBEDDING_TIMEOUT_MS', 5000),
    completionTimeoutMs: envInt('COMPLETION_TIMEOUT_MS', 30000),
    completionRetry: envBool('COMPLETION_RETRY', true),
    anthropicApiKey: process.env['ANTHROPIC_API_KEY'] ?? null,
    defaultModel: envString('DEFAULT_MODEL', 'claude-haiku-4-5-20251001'),
    memoryK: envInt('MEMORY_K', 6),
    threadWindow: envInt('THREAD_WINDOW', 20),
    userMemoryLimit: envInt('USER_MEMORY_LIMIT', 3),
    decayRate: envFloat('DECAY_RATE', 0.995),
    weightSimilarity: envFloat('WEIGHT_SIMILARITY', 0.45),
    weightRecency: envFloat('WEIGHT_RECENCY', 0.35),
    weightReinforcement: envFloat('WEIGHT_REINFORCEMENT', 0.2),
    validationInterval: envInt('VALIDATION_INTERVAL', 3600000),
    autoRepair: envBool('AUTO_REPAIR', true),
    traitDefaults: envTraitDefaults(),
    logLevel: envLogLevel,
  }

  if (overrides) {
    const { traitDefaults, ...rest } = overrides
    Object.assign(base, Object.fromEntries(
      Object.entries(rest).filter(([, v]) => v !== undefined),
    ))
    if (traitDefaults) {
      Object.assign(base.traitDefaults, Object.fromEntries(
        Object.entries(traitDefaults).filter(([, v]) => v !== undefined),
      ))
    }
  }

  return validateConfig(base)
}

function validateConfig(config: Omit<Config, 'logLevel'> & { logLevel: string }): Config {
  const errors: string[] = []

  if (!config.dataDir || config.dataDir.includes('\0')) {
    errors.push('dataDir must be a non-empty path without null bytes')
  }
  if (config.embeddingDimensions <= 0) {
    errors.push(`embeddingDimensions must be > 0, got ${config.embeddingDimensions}`)
  }
  if (config.embeddingTimeoutMs <= 0) {
    errors.push(`embeddingTimeoutMs must be > 0, got ${config.embeddingTimeoutMs}`)
  }
  if (config.completionTimeoutMs <= 0) {
    errors.push(`completionTimeoutMs must be > 0, got ${config.completionTimeoutMs}`)
  }
  if (config.memoryK < 1 || config.memoryK > 20) {
    errors.push(`memoryK must be in [1, 20], got ${config.memoryK}`)
  }
  if (config.threadWindow < 5 || config.threadWindow > 50) {
    errors.push(`threadWindow must be in [5, 50], got ${config.threadWindow}`)
  }
  if (config.userMemoryLimit < 0) {
    errors.push(`userMemoryLimit must be >= 0, got ${config.userMemoryLimit}`)
  }
  if (config.decayRate <= 0 || config.decayRate >= 1) {
    errors.push(`decayRate must be in (0, 1) exclusive, got ${config.decayRate}`)
  }
  if (config.weightSimilarity < 0) {
    errors.push(`weightSimilarity must be >= 0, got ${config.weightSimilarity}`)
  }
  if (config.weightRecency < 0) {
    errors.push(`weightRecency must be >= 0, got ${config.weightRecency}`)
  }
  if (config.weightReinforcement < 0) {
    errors.push(`weightReinforcement must be >= 0, got ${config.weightReinforcement}`)
  }
  if (config.validationInterval <= 0) {
    errors.push(`validationInterval must be > 0, got ${config.validationInterval}`)
  }
  for (const name of TRAIT_NAMES) {
    const value = config.traitDefaults[name]
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      errors.push(`traitDefaults.${name} must be an integer in [0, 100], got ${value}`)
    }
  }
  const { logLevel } = config
  if (!isLogLevel(logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, got ${logLevel}`)
  }

  if (errors.length > 0 || !isLogLevel(logLevel)) {
    throw new Error(`Invalid configuration:\n  - ${errors.join('\n  - ')}`)
  }

  const weightSum = config.weightSimilarity + config.weightRecency + config.weightReinforcement
  if (Math.abs(weightSum - 1.0) > 0.01) {
    logger.warn(`Memory scoring weights sum to ${weightSum.toFixed(3)} instead of 1.0. Scores may not be normalized.`)
  }

  return { ...config, logLevel }
}
