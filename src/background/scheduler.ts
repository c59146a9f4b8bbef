import type { Config } from '../core/config.js'
import { stateKeys } from '../core/constants.js'
import type { ContractValidator, ValidationSummary } from '../contracts/validator.js'
import type { SqliteStorage } from '../storage/sqlite.js'
import { logger } from '../utils/logger.js'

const log = logger.child('scheduler')

export type SchedulerConfig = Pick<Config, 'validationInterval' | 'autoRepair'>

export class BackgroundScheduler {
  private validationTimer: ReturnType<typeof setInterval> | null = null
  private running = false

  constructor(
    private validator: ContractValidator,
    private db: SqliteStorage,
    private config: SchedulerConfig,
  ) {}

  start(): void {
    if (this.running) return
    this.running = true

    this.validationTimer = setInterval(() => {
      try {
        this.runValidation()
      } catch (err) {
        log.error('Background contract validation failed', err)
      }
    }, this.config.validationInterval)
    // Never keep the process alive just for validation
    this.validationTimer.unref()
    log.info(`Contract validation scheduled every ${this.config.validationInterval / 1000}s (auto-repair ${this.config.autoRepair ? 'on' : 'off'})`)
  }

  stop(): void {
    if (this.validationTimer) {
      clearInterval(this.validationTimer)
      this.validationTimer = null
    }
    this.running = false
    log.info('Background scheduler stopped')
  }

  get isRunning(): boolean {
    return this.running
  }

  runValidation(): ValidationSummary {
    const summary = this.validator.validateAll({ autoRepair: this.config.autoRepair })
    this.db.setState(stateKeys.lastValidationAt, new Date().toISOString())
    this.db.setState(stateKeys.lastValidationSummary, JSON.stringify(summary))
    return summary
  }
}
