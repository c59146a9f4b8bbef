import type { SqliteStorage } from '../storage/sqlite.js'
import { NotFoundError } from '../core/errors.js'
import type { RenderedPrompt } from '../core/types.js'
import type { TraitModulator } from '../modulation/trait-modulator.js'
import { logger } from '../utils/logger.js'
import { rowToContract } from './store.js'

const log = logger.child('validator')

export interface CheckResult {
  agent_id: string
  valid: boolean
  differences: string[]
}

export type RepairAction = 'none' | 'created_cache' | 'overwrote_cache'

export interface RepairResult {
  agent_id: string
  repaired: boolean
  action: RepairAction
  differences: string[]
}

export interface ValidationFailure {
  agent_id: string
  error: string
}

export interface ValidationSummary {
  total: number
  valid: number
  repaired: number
  failed: number
  failures: ValidationFailure[]
}

export interface ValidateAllOptions {
  tenantId?: string
  autoRepair: boolean
}

interface Expected {
  version: string
  rendered: RenderedPrompt
}

/**
 * Reconciles the rendered-prompt cache with the authoritative contract. The
 * contract always wins: a mismatched cache is overwritten, never the reverse.
 */
export class ContractValidator {
  constructor(
    private db: SqliteStorage,
    private modulator: TraitModulator,
  ) {}

  check(agentId: string): CheckResult {
    const expected = this.expected(agentId)
    return { agent_id: agentId, ...this.compare(agentId, expected) }
  }

  repair(agentId: string): RepairResult {
    return this.db.transaction((): RepairResult => {
      const expected = this.expected(agentId)
      const { valid, differences } = this.compare(agentId, expected)
      if (valid) {
        return { agent_id: agentId, repaired: false, action: 'none', differences }
      }
      const hadCache = this.db.getRenderedPrompt(agentId) !== null
      this.db.upsertRenderedPrompt({
        agent_id: agentId,
        version: expected.version,
        system_prompt: expected.rendered.system_prompt,
        directives: JSON.stringify(expected.rendered.directives),
        rendered_at: new Date().toISOString(),
      })
      const action: RepairAction = hadCache ? 'overwrote_cache' : 'created_cache'
      log.info(`Repaired prompt cache for agent ${agentId} (${action})`, { differences })
      return { agent_id: agentId, repaired: true, action, differences }
    })
  }

  validateAll(options: ValidateAllOptions): ValidationSummary {
    const ids = this.db.getAgentIds(options.tenantId)
    const summary: ValidationSummary = { total: ids.length, valid: 0, repaired: 0, failed: 0, failures: [] }

    for (const agentId of ids) {
      try {
        const result = this.check(agentId)
        if (result.valid) {
          summary.valid++
        } else if (options.autoRepair) {
          this.repair(agentId)
          summary.repaired++
        } else {
          summary.failed++
          summary.failures.push({ agent_id: agentId, error: result.differences.join('; ') })
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        log.error(`Validation failed for agent ${agentId}`, { error: message })
        summary.failed++
        summary.failures.push({ agent_id: agentId, error: message })
      }
    }

    log.info(
      `Validated ${summary.total} contracts: ${summary.valid} valid, ${summary.repaired} repaired, ${summary.failed} failed`,
    )
    return summary
  }

  private expected(agentId: string): Expected {
    const row = this.db.getAgent(agentId)
    if (!row) {
      throw new NotFoundError(`Agent ${agentId} not found`)
    }
    const contract = rowToContract(row)
    return { version: contract.version, rendered: this.modulator.render(contract) }
  }

  private compare(agentId: string, expected: Expected): { valid: boolean; differences: string[] } {
    const cached = this.db.getRenderedPrompt(agentId)
    if (!cached) {
      return { valid: false, differences: ['cache: missing'] }
    }
    const differences: string[] = []
    if (cached.version !== expected.version) {
      differences.push(`version: cached ${cached.version}, contract ${expected.version}`)
    }
    if (cached.system_prompt !== expected.rendered.system_prompt) {
      differences.push('system_prompt: differs from rendered contract')
    }
    if (cached.directives !== JSON.stringify(expected.rendered.directives)) {
      differences.push('directives: differ from rendered contract')
    }
    return { valid: differences.length === 0, differences }
  }
}
