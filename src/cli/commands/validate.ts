import type { Config } from '../../core/config.js'
import { ContractValidator } from '../../contracts/validator.js'
import { TraitModulator } from '../../modulation/trait-modulator.js'
import { SqliteStorage } from '../../storage/sqlite.js'

export function runValidate(config: Config, tenantId: string | undefined, repair: boolean): void {
  const sqlite = SqliteStorage.fromConfig(config)

  try {
    const validator = new ContractValidator(sqlite, new TraitModulator())
    console.log(`Validating contracts${tenantId ? ` for tenant ${tenantId}` : ''}${repair ? ' (repairing)' : ''}...`)

    const summary = validator.validateAll({ tenantId, autoRepair: repair })

    console.log('\nValidation complete:')
    console.log(`  Checked:   ${summary.total}`)
    console.log(`  Valid:     ${summary.valid}`)
    console.log(`  Repaired:  ${summary.repaired}`)
    console.log(`  Failed:    ${summary.failed}`)
    for (const failure of summary.failures) {
      console.log(`\n  [${failure.agent_id}] ${failure.error}`)
    }

    if (summary.failed > 0) process.exitCode = 1
  } finally {
    sqlite.close()
  }
}
