import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { z } from 'zod'
import { AGENT_STATUSES, AGENT_TYPES, contractPatchArgs, createAgentArgs } from '../contracts/schema.js'
import { AgentRuntimeError } from '../core/errors.js'
import type { AgentContract } from '../core/types.js'
import type { AgentRuntime } from '../runtime/runtime.js'
import { logger } from '../utils/logger.js'
import { escapeXml, formatXml } from '../utils/xml.js'

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>
  isError?: boolean
}

async function respond(work: () => Promise<string> | string): Promise<ToolResult> {
  try {
    return { content: [{ type: 'text', text: await work() }] }
  } catch (err) {
    const code = err instanceof AgentRuntimeError ? err.code : 'INTERNAL_ERROR'
    const message = err instanceof Error ? err.message : String(err)
    if (!(err instanceof AgentRuntimeError)) {
      logger.error('Tool call failed unexpectedly', { error: err })
    }
    return {
      content: [{ type: 'text', text: formatXml('error', { code }, escapeXml(message)) }],
      isError: true,
    }
  }
}

function agentSummary(contract: AgentContract): string {
  return formatXml('agent', {
    id: contract.id,
    name: contract.name,
    type: contract.type,
    status: contract.status,
    version: contract.version,
  })
}

export function createMcpServer(runtime: AgentRuntime): McpServer {
  const { contracts, validator, orchestrator, memory, db, vectors } = runtime

  const server = new McpServer({
    name: 'agent-contract-runtime',
    version: '0.1.0',
  })

  // ========== CONTRACT TOOLS ==========

  server.tool(
    'create_agent',
    'Create an agent from a contract. Missing traits and configuration take the runtime defaults; voice agents need a voice block with at least a voice_id.',
    createAgentArgs,
    async (args) => respond(() => {
      const contract = contracts.create(args)
      return formatXml('agent_created', {
        id: contract.id,
        name: contract.name,
        type: contract.type,
        version: contract.version,
        status: contract.status,
      })
    }),
  )

  server.tool(
    'get_agent',
    'Fetch the full contract of an agent as JSON.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      include_archived: z.boolean().optional().describe('Also return archived agents'),
    },
    async (args) => respond(() => {
      const record = contracts.getRecord(args.agent_id, args.tenant_id, { includeArchived: args.include_archived })
      return formatXml('agent', {
        id: record.contract.id,
        version: record.contract.version,
        status: record.contract.status,
        interaction_count: record.interaction_count,
        last_interaction_at: record.last_interaction_at,
      }, escapeXml(JSON.stringify(record.contract, null, 2)))
    }),
  )

  server.tool(
    'list_agents',
    'List a tenant\'s agents, newest first. Archived agents only appear when status is "archived".',
    {
      tenant_id: z.string().describe('Tenant identifier'),
      status: z.enum(AGENT_STATUSES).optional().describe('Filter by status'),
      type: z.enum(AGENT_TYPES).optional().describe('Filter by agent type'),
      tag: z.string().optional().describe('Only agents carrying this tag'),
      limit: z.number().int().min(1).max(500).optional().describe('Max results (default 50)'),
      offset: z.number().int().min(0).optional().describe('Results to skip'),
    },
    async (args) => respond(() => {
      const agents = contracts.list(args.tenant_id, {
        status: args.status,
        type: args.type,
        tag: args.tag,
        limit: args.limit,
        offset: args.offset,
      })
      if (agents.length === 0) {
        return formatXml('agents', { count: 0 })
      }
      return formatXml('agents', { count: agents.length }, agents.map(agentSummary).join('\n'))
    }),
  )

  server.tool(
    'update_agent',
    'Apply a partial update to a contract. The previous version is kept in the history and the patch version is bumped. Pass expected_version to fail instead of overwriting a concurrent change.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      patch: z.object(contractPatchArgs).describe('Fields to change; nested blocks are merged, voice: null removes voice'),
      expected_version: z.string().optional().describe('Version the caller last read'),
      actor_id: z.string().optional().describe('Who is making the change'),
      change_summary: z.string().optional().describe('Recorded in the version history'),
    },
    async (args) => respond(() => {
      const contract = contracts.update(args.agent_id, args.tenant_id, args.patch, {
        expectedVersion: args.expected_version,
        actorId: args.actor_id,
        changeSummary: args.change_summary,
      })
      return formatXml('agent_updated', { id: contract.id, version: contract.version, status: contract.status })
    }),
  )

  server.tool(
    'archive_agent',
    'Archive an agent. Archived agents keep their history but can no longer chat or be updated.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      actor_id: z.string().optional().describe('Who is archiving the agent'),
    },
    async (args) => respond(() => {
      const archived = contracts.archive(args.agent_id, args.tenant_id, { actorId: args.actor_id })
      return formatXml('agent_archived', { id: args.agent_id, archived })
    }),
  )

  server.tool(
    'agent_history',
    'List the stored versions of a contract, oldest first.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
    },
    async (args) => respond(() => {
      const versions = contracts.history(args.agent_id, args.tenant_id)
      const body = versions.map(v => formatXml('version', {
        number: v.version,
        change_summary: v.change_summary,
        created_by: v.created_by,
        created_at: v.created_at,
      }))
      return body.length > 0
        ? formatXml('agent_history', { agent_id: args.agent_id, count: versions.length }, body.join('\n'))
        : formatXml('agent_history', { agent_id: args.agent_id, count: 0 })
    }),
  )

  server.tool(
    'get_system_prompt',
    'Show the system prompt the agent\'s traits render to, as currently cached.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
    },
    async (args) => respond(() => {
      const cached = contracts.getCachedPrompt(args.agent_id, args.tenant_id)
      if (!cached) {
        return formatXml('system_prompt', { agent_id: args.agent_id, cached: false })
      }
      return formatXml('system_prompt', {
        agent_id: cached.agent_id,
        version: cached.version,
        rendered_at: cached.rendered_at,
        directives: cached.directives.length,
      }, escapeXml(cached.system_prompt))
    }),
  )

  server.tool(
    'validate_contracts',
    'Compare every active contract with its cached prompt and report differences. With auto_repair the cache is rebuilt from the contract.',
    {
      tenant_id: z.string().optional().describe('Only validate this tenant'),
      auto_repair: z.boolean().optional().describe('Rebuild stale caches (default false)'),
    },
    async (args) => respond(() => {
      const summary = validator.validateAll({ tenantId: args.tenant_id, autoRepair: args.auto_repair ?? false })
      const attrs = { total: summary.total, valid: summary.valid, repaired: summary.repaired, failed: summary.failed }
      if (summary.failures.length === 0) {
        return formatXml('validation_result', attrs)
      }
      const failures = summary.failures.map(f => formatXml('failure', { agent_id: f.agent_id }, escapeXml(f.error)))
      return formatXml('validation_result', attrs, failures.join('\n'))
    }),
  )

  // ========== CONVERSATION TOOLS ==========

  server.tool(
    'chat',
    'Send a user message to an agent and get its reply. Omit thread_id to start a new conversation; reuse the returned thread_id to continue it.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      user_id: z.string().describe('End user the conversation belongs to'),
      message: z.string().describe('The user\'s message'),
      thread_id: z.string().optional().describe('Conversation to continue'),
    },
    async (args, extra) => respond(async () => {
      const result = await orchestrator.process({
        agentId: args.agent_id,
        tenantId: args.tenant_id,
        userId: args.user_id,
        userInput: args.message,
        threadId: args.thread_id,
        signal: extra.signal,
      })
      return formatXml('chat_response', {
        thread_id: result.thread_id,
        model: result.metadata.model,
        message_count: result.metadata.message_count,
        memory_confidence: result.metadata.memory_confidence.toFixed(2),
        retrieved_memories: result.metadata.retrieved_memories,
        memory_stored: result.metadata.memory_stored,
      }, escapeXml(result.response))
    }),
  )

  // ========== MEMORY TOOLS ==========

  server.tool(
    'remember',
    'Store an explicit memory for an agent, or for one of its users. Identical content in the same place is reinforced rather than duplicated.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      content: z.string().describe('What to remember'),
      user_id: z.string().optional().describe('Scope the memory to this user'),
      memory_type: z.string().optional().describe('Free-form tag, e.g. fact, preference (default fact)'),
      metadata: z.record(z.unknown()).optional().describe('Additional structured data'),
    },
    async (args) => respond(async () => {
      contracts.get(args.agent_id, args.tenant_id)
      const result = await memory.remember({
        tenantId: args.tenant_id,
        agentId: args.agent_id,
        userId: args.user_id,
        content: args.content,
        memoryType: args.memory_type,
        metadata: args.metadata,
      })
      return formatXml('memory_stored', { id: result.id, created: result.created })
    }),
  )

  server.tool(
    'search_memory',
    'Search an agent\'s memories by meaning. Without user_id this covers the agent and all of its users.',
    {
      agent_id: z.string().describe('Agent identifier'),
      tenant_id: z.string().describe('Tenant that owns the agent'),
      query: z.string().describe('Natural language search query'),
      user_id: z.string().optional().describe('Only this user\'s memories'),
      memory_type: z.string().optional().describe('Filter by memory type'),
      limit: z.number().int().min(1).max(50).optional().describe('Max results (default 10)'),
    },
    async (args) => respond(async () => {
      contracts.get(args.agent_id, args.tenant_id)
      const results = await memory.search({
        tenantId: args.tenant_id,
        agentId: args.agent_id,
        userId: args.user_id,
        query: args.query,
        memoryType: args.memory_type,
        limit: args.limit ?? 10,
      })
      if (results.length === 0) {
        return formatXml('search_results', { count: 0 })
      }
      const body = results.map(m => formatXml('memory', {
        id: m.id,
        type: m.memory_type,
        namespace: m.namespace,
        score: m.score.toFixed(3),
        similarity: m.similarity.toFixed(3),
        created_at: m.created_at,
      }, escapeXml(m.content)))
      return formatXml('search_results', { count: results.length }, body.join('\n'))
    }),
  )

  server.tool(
    'runtime_status',
    'Runtime statistics: agents, versions, threads, messages, memories and the last validation run.',
    {},
    async () => respond(async () => {
      const stats = db.getStats()
      const vectorCount = await vectors.count()
      return `<runtime_status>
  <agents>${stats.agent_count}</agents>
  <archived_agents>${stats.archived_agent_count}</archived_agents>
  <contract_versions>${stats.version_count}</contract_versions>
  <cached_prompts>${stats.cached_prompt_count}</cached_prompts>
  <threads>${stats.thread_count}</threads>
  <messages>${stats.message_count}</messages>
  <memories>${stats.memory_count}</memories>
  <vector_embeddings>${vectorCount}</vector_embeddings>
  <last_validation>${stats.last_validation_at ?? 'never'}</last_validation>
</runtime_status>`
    }),
  )

  return server
}

export async function startMcpServer(runtime: AgentRuntime): Promise<{ server: McpServer }> {
  const server = createMcpServer(runtime)
  const transport = new StdioServerTransport()
  await server.connect(transport)
  logger.info('Agent runtime MCP server started (stdio transport)')
  return { server }
}
