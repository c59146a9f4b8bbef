import type { Config } from '../../core/config.js'
import { ContractStore } from '../../contracts/store.js'
import { contractDefaultsFromConfig } from '../../contracts/schema.js'
import { TraitModulator } from '../../modulation/trait-modulator.js'
import { SqliteStorage } from '../../storage/sqlite.js'

export function runPrompt(config: Config, agentId: string, tenantId: string): void {
  const sqlite = SqliteStorage.fromConfig(config)

  try {
    const modulator = new TraitModulator()
    const contracts = new ContractStore(sqlite, modulator, contractDefaultsFromConfig(config))
    const contract = contracts.get(agentId, tenantId, { includeArchived: true })
    const cached = contracts.getCachedPrompt(agentId, tenantId)

    if (!cached) {
      console.error(`No cached prompt for ${agentId}; run "agent-runtime validate --repair" to rebuild it`)
      process.exitCode = 1
      return
    }
    if (cached.version !== contract.version) {
      console.error(`Cached prompt is for version ${cached.version} but the contract is at ${contract.version}`)
    }

    console.log(cached.system_prompt)
  } finally {
    sqlite.close()
  }
}
