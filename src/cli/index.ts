import { Command } from 'commander'
import { loadConfig } from '../core/config.js'
import { setLogLevel } from '../utils/logger.js'

interface DataDirOptions {
  dataDir?: string
}

export function createCli(): Command {
  const program = new Command()

  program
    .name('agent-runtime')
    .description('Contract-defined agents with versioned personalities and namespaced memory')
    .version('0.1.0')

  program
    .command('init')
    .description('Initialize the data directory and database')
    .option('-d, --data-dir <path>', 'Data directory path', './data')
    .action(async (opts: DataDirOptions) => {
      const config = loadConfig({ dataDir: opts.dataDir })
      const { runInit } = await import('./commands/init.js')
      runInit(config)
    })

  program
    .command('serve')
    .description('Start the agent runtime MCP server (stdio transport)')
    .option('-d, --data-dir <path>', 'Data directory path')
    .option('--log-level <level>', 'Log level (debug, info, warn, error)')
    .action(async (opts: DataDirOptions & { logLevel?: string }) => {
      const config = loadConfig({
        dataDir: opts.dataDir,
        logLevel: opts.logLevel,
      })
      setLogLevel(config.logLevel)

      const { runServe } = await import('./commands/serve.js')
      await runServe(config)
    })

  program
    .command('status')
    .description('Show runtime statistics')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (opts: DataDirOptions) => {
      const config = loadConfig({ dataDir: opts.dataDir })
      const { runStatus } = await import('./commands/status.js')
      await runStatus(config)
    })

  program
    .command('validate')
    .description('Check every active contract against its cached prompt')
    .option('-t, --tenant <id>', 'Only validate this tenant')
    .option('-r, --repair', 'Rebuild stale or missing caches')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (opts: DataDirOptions & { tenant?: string; repair?: boolean }) => {
      const config = loadConfig({ dataDir: opts.dataDir })
      const { runValidate } = await import('./commands/validate.js')
      runValidate(config, opts.tenant, opts.repair ?? false)
    })

  program
    .command('chat')
    .description('Send one message to an agent and print the reply')
    .argument('<message...>', 'Message text')
    .requiredOption('-a, --agent-id <id>', 'Agent identifier')
    .requiredOption('-t, --tenant <id>', 'Tenant identifier')
    .requiredOption('-u, --user-id <id>', 'End user identifier')
    .option('--thread-id <id>', 'Continue this conversation')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (words: string[], opts: DataDirOptions & { agentId: string; tenant: string; userId: string; threadId?: string }) => {
      const config = loadConfig({ dataDir: opts.dataDir })
      const { runChat } = await import('./commands/chat.js')
      await runChat(config, words.join(' '), {
        agentId: opts.agentId,
        tenantId: opts.tenant,
        userId: opts.userId,
        threadId: opts.threadId,
      })
    })

  program
    .command('prompt')
    .description('Print the cached system prompt of an agent')
    .requiredOption('-a, --agent-id <id>', 'Agent identifier')
    .requiredOption('-t, --tenant <id>', 'Tenant identifier')
    .option('-d, --data-dir <path>', 'Data directory path')
    .action(async (opts: DataDirOptions & { agentId: string; tenant: string }) => {
      const config = loadConfig({ dataDir: opts.dataDir })
      const { runPrompt } = await import('./commands/prompt.js')
      runPrompt(config, opts.agentId, opts.tenant)
    })

  return program
}
