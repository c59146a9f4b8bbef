import type { Config } from '../../core/config.js'
import { BackgroundScheduler } from '../../background/scheduler.js'
import { startMcpServer } from '../../mcp/server.js'
import { openRuntime } from '../../runtime/runtime.js'
import { logger } from '../../utils/logger.js'

export async function runServe(config: Config): Promise<void> {
  logger.info('Starting agent runtime MCP server...')

  const runtime = openRuntime(config)

  logger.info(`Data directory: ${config.dataDir}`)
  logger.info(`Embedding model: ${config.embeddingModel}`)
  logger.info(`Default model: ${config.defaultModel}`)
  if (!config.embeddingApiKey) {
    logger.warn('EMBEDDING_API_KEY is not set; memory retrieval and storage will be skipped')
  }
  if (!config.anthropicApiKey) {
    logger.warn('ANTHROPIC_API_KEY is not set; chat requests will fail until it is configured')
  }

  const scheduler = new BackgroundScheduler(runtime.validator, runtime.db, config)
  scheduler.start()

  const { server } = await startMcpServer(runtime)

  const shutdown = async (): Promise<void> => {
    scheduler.stop()
    const timeout = setTimeout(() => process.exit(1), 5000)
    try {
      await server.close()
      runtime.close()
    } finally {
      clearTimeout(timeout)
      process.exit(0)
    }
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}
