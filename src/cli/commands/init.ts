import { existsSync, mkdirSync } from 'fs'
import { resolve } from 'path'
import type { Config } from '../../core/config.js'
import { SqliteStorage } from '../../storage/sqlite.js'
import { logger } from '../../utils/logger.js'

export function runInit(config: Config): void {
  const resolved = resolve(config.dataDir)

  if (existsSync(resolved)) {
    logger.info(`Data directory already exists: ${resolved}`)
  } else {
    mkdirSync(resolved, { recursive: true })
    logger.info(`Created data directory: ${resolved}`)
  }

  const lanceDir = resolve(resolved, 'lancedb')
  if (!existsSync(lanceDir)) {
    mkdirSync(lanceDir, { recursive: true })
  }

  // Opening the database applies the schema
  SqliteStorage.fromConfig(config).close()

  logger.info('Agent runtime initialized successfully')
  logger.info('Start the MCP server with: agent-runtime serve')
}
