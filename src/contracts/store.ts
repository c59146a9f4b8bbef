import type { SqliteStorage, AgentRow, ContractVersionRow } from '../storage/sqlite.js'
import { INITIAL_CONTRACT_VERSION } from '../core/constants.js'
import { ConflictError, NotFoundError, PersistenceError, ValidationError } from '../core/errors.js'
import { generateId } from '../core/ids.js'
import type {
  AgentContract,
  AgentRecord,
  AgentStatus,
  AgentType,
  CachedPrompt,
  ContractVersion,
} from '../core/types.js'
import { parseDirectives } from '../modulation/trait-modulator.js'
import type { TraitModulator } from '../modulation/trait-modulator.js'
import { logger } from '../utils/logger.js'
import { bumpPatch } from '../utils/version.js'
import {
  applyPatch,
  describePatch,
  parseContract,
  parseCreateInput,
  parsePatch,
} from './schema.js'
import type { ContractDefaults, ContractPatch, CreateAgentInput } from './schema.js'

const log = logger.child('contracts')

export interface GetOptions {
  includeArchived?: boolean
}

export interface ListOptions {
  status?: AgentStatus
  type?: AgentType
  tag?: string
  limit?: number
  offset?: number
}

export interface UpdateOptions {
  expectedVersion?: string
  actorId?: string
  changeSummary?: string
}

export interface ArchiveOptions {
  actorId?: string
}

/**
 * Authoritative store for agent contracts. Every mutation snapshots the prior
 * state into the version history, then compare-and-swaps on `version`, then
 * regenerates the rendered-prompt cache, all in one SQLite transaction.
 */
export class ContractStore {
  constructor(
    private db: SqliteStorage,
    private modulator: TraitModulator,
    private defaults: ContractDefaults,
  ) {}

  create(input: CreateAgentInput): AgentContract {
    const parsed = parseCreateInput(input, this.defaults)
    const now = new Date().toISOString()
    const contract = parseContract({
      ...parsed,
      id: parsed.id ?? generateId(),
      version: INITIAL_CONTRACT_VERSION,
      voice: parsed.voice ?? null,
      created_at: now,
      updated_at: now,
    })

    this.db.transaction(() => {
      if (this.db.getAgent(contract.id)) {
        throw new ConflictError(`Agent ${contract.id} already exists`)
      }
      this.db.insertAgent({
        id: contract.id,
        tenant_id: contract.tenant_id,
        owner_id: contract.owner_id,
        name: contract.name,
        type: contract.type,
        status: contract.status,
        version: contract.version,
        payload: JSON.stringify(contract),
        tags: JSON.stringify(contract.tags),
        created_at: contract.created_at,
        updated_at: contract.updated_at,
      })
      this.writeCache(contract, now)
    })

    log.info(`Created agent ${contract.id} (${contract.type}) for tenant ${contract.tenant_id}`)
    return contract
  }

  get(agentId: string, tenantId: string, options: GetOptions = {}): AgentContract {
    return this.getRecord(agentId, tenantId, options).contract
  }

  getRecord(agentId: string, tenantId: string, options: GetOptions = {}): AgentRecord {
    const row = this.db.getAgent(agentId)
    if (!row || row.tenant_id !== tenantId || (row.status === 'archived' && !options.includeArchived)) {
      throw new NotFoundError(`Agent ${agentId} not found for tenant ${tenantId}`)
    }
    return {
      contract: rowToContract(row),
      interaction_count: row.interaction_count,
      last_interaction_at: row.last_interaction_at,
    }
  }

  list(tenantId: string, options: ListOptions = {}): AgentContract[] {
    const rows = this.db.listAgents({
      tenantId,
      status: options.status,
      type: options.type,
      tag: options.tag,
      includeArchived: false,
      limit: Math.max(1, Math.min(options.limit ?? 50, 500)),
      offset: Math.max(0, options.offset ?? 0),
    })
    return rows.map(rowToContract)
  }

  update(agentId: string, tenantId: string, patch: ContractPatch, options: UpdateOptions = {}): AgentContract {
    const validPatch = parsePatch(patch)
    const now = new Date().toISOString()

    const next = this.db.transaction(() => {
      const current = this.loadMutable(agentId, tenantId)
      if (options.expectedVersion !== undefined && options.expectedVersion !== current.version) {
        throw new ConflictError(
          `Agent ${agentId} is at version ${current.version}, expected ${options.expectedVersion}`,
        )
      }
      this.snapshot(current, options.actorId, options.changeSummary ?? describePatch(validPatch), now)

      const merged = applyPatch(current, validPatch)
      const updated: AgentContract = {
        ...merged,
        id: current.id,
        tenant_id: current.tenant_id,
        owner_id: current.owner_id,
        created_at: current.created_at,
        version: bumpPatch(current.version),
        updated_at: now,
      }
      this.swap(current.version, updated)
      this.writeCache(updated, now)
      return updated
    })

    log.info(`Updated agent ${agentId} to version ${next.version}`)
    return next
  }

  archive(agentId: string, tenantId: string, options: ArchiveOptions = {}): boolean {
    const now = new Date().toISOString()
    const archived = this.db.transaction(() => {
      const row = this.db.getAgent(agentId)
      if (!row || row.tenant_id !== tenantId || row.status === 'archived') {
        return false
      }
      const current = rowToContract(row)
      this.snapshot(current, options.actorId, 'Archived', now)
      const updated: AgentContract = {
        ...current,
        status: 'archived',
        version: bumpPatch(current.version),
        updated_at: now,
      }
      this.swap(current.version, updated)
      this.writeCache(updated, now)
      return true
    })
    if (archived) log.info(`Archived agent ${agentId}`)
    return archived
  }

  history(agentId: string, tenantId: string): ContractVersion[] {
    this.getRecord(agentId, tenantId, { includeArchived: true })
    return this.db.getContractVersions(agentId).map(rowToVersion)
  }

  recordInteraction(agentId: string): void {
    if (!this.db.recordAgentInteraction(agentId, new Date().toISOString())) {
      throw new NotFoundError(`Agent ${agentId} not found`)
    }
  }

  getCachedPrompt(agentId: string, tenantId: string): CachedPrompt | null {
    this.getRecord(agentId, tenantId, { includeArchived: true })
    const row = this.db.getRenderedPrompt(agentId)
    if (!row) return null
    return {
      agent_id: row.agent_id,
      version: row.version,
      system_prompt: row.system_prompt,
      directives: parseDirectives(row.directives) ?? [],
      rendered_at: row.rendered_at,
    }
  }

  private loadMutable(agentId: string, tenantId: string): AgentContract {
    const row = this.db.getAgent(agentId)
    if (!row || row.tenant_id !== tenantId || row.status === 'archived') {
      throw new NotFoundError(`Agent ${agentId} not found for tenant ${tenantId}`)
    }
    return rowToContract(row)
  }

  private snapshot(current: AgentContract, actorId: string | undefined, summary: string, at: string): void {
    this.db.insertContractVersion({
      id: generateId(),
      agent_id: current.id,
      version: current.version,
      payload: JSON.stringify(current),
      change_summary: summary,
      created_by: actorId ?? 'system',
      created_at: at,
    })
  }

  private swap(expectedVersion: string, next: AgentContract): void {
    const applied = this.db.updateAgentIfVersion(next.id, expectedVersion, {
      name: next.name,
      type: next.type,
      status: next.status,
      version: next.version,
      payload: JSON.stringify(next),
      tags: JSON.stringify(next.tags),
      updated_at: next.updated_at,
    })
    if (!applied) {
      throw new ConflictError(`Agent ${next.id} changed concurrently; reload and retry`)
    }
  }

  private writeCache(contract: AgentContract, at: string): void {
    const rendered = this.modulator.render(contract)
    this.db.upsertRenderedPrompt({
      agent_id: contract.id,
      version: contract.version,
      system_prompt: rendered.system_prompt,
      directives: JSON.stringify(rendered.directives),
      rendered_at: at,
    })
  }
}

export function rowToContract(row: AgentRow): AgentContract {
  let payload: unknown
  try {
    payload = JSON.parse(row.payload)
  } catch (err) {
    throw new PersistenceError(`Stored contract for agent ${row.id} is not valid JSON`, err)
  }
  try {
    return parseContract(payload)
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new PersistenceError(`Stored contract for agent ${row.id} is corrupt: ${err.issues.join('; ')}`, err)
    }
    throw err
  }
}

function rowToVersion(row: ContractVersionRow): ContractVersion {
  let payload: unknown
  try {
    payload = JSON.parse(row.payload)
  } catch (err) {
    throw new PersistenceError(`Version ${row.version} of agent ${row.agent_id} is not valid JSON`, err)
  }
  return {
    id: row.id,
    agent_id: row.agent_id,
    version: row.version,
    contract: parseContract(payload),
    change_summary: row.change_summary,
    created_by: row.created_by,
    created_at: row.created_at,
  }
}
