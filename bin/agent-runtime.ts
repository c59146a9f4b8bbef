#!/usr/bin/env node

import { createCli } from '../src/cli/index.js'
import { AgentRuntimeError } from '../src/core/errors.js'
import { logger } from '../src/utils/logger.js'

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err })
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { error: reason })
  process.exit(1)
})

createCli()
  .parseAsync()
  .catch((err: unknown) => {
    if (err instanceof AgentRuntimeError) {
      logger.error(`${err.code}: ${err.message}`)
    } else {
      logger.error('Command failed', { error: err })
    }
    process.exitCode = 1
  })
