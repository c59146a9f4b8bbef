import { describe, it, expect, beforeEach, vi } from 'vitest'
import { SqliteStorage, parseJsonColumn } from './sqlite.js'
import type { MemoryRow, NewAgentRow, ThreadRow } from './sqlite.js'
import { ConflictError } from '../core/errors.js'
import { generateId } from '../core/ids.js'

function makeAgent(overrides?: Partial<NewAgentRow>): NewAgentRow {
  return {
    id: generateId(),
    tenant_id: 't1',
    owner_id: 'owner-1',
    name: 'Helper',
    type: 'conversational',
    status: 'active',
    version: '1.0.0',
    payload: '{}',
    tags: '[]',
    created_at: '2025-01-01T00:00:00.000Z',
    updated_at: '2025-01-01T00:00:00.000Z',
    ...overrides,
  }
}

function makeThread(agentId: string, overrides?: Partial<ThreadRow>): ThreadRow {
  return {
    id: generateId(),
    agent_id: agentId,
    user_id: 'u1',
    tenant_id: 't1',
    title: 'Conversation 2025-01-01 00:00',
    status: 'active',
    message_count: 0,
    last_message_at: null,
    created_at: '2025-01-01T00:00:00.000Z',
    updated_at: '2025-01-01T00:00:00.000Z',
    ...overrides,
  }
}

function makeMemory(overrides?: Partial<MemoryRow>): MemoryRow {
  return {
    id: generateId(),
    namespace: 't1:a1',
    tenant_id: 't1',
    agent_id: 'a1',
    content: 'User: hi\nAssistant: hello',
    content_hash: generateId(),
    memory_type: 'conversation',
    metadata: '{}',
    access_count: 0,
    last_accessed_at: null,
    created_at: '2025-01-01T00:00:00.000Z',
    updated_at: '2025-01-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('SqliteStorage', () => {
  let db: SqliteStorage

  beforeEach(() => {
    db = SqliteStorage.inMemory()
  })

  describe('agents', () => {
    it('inserts and retrieves an agent with zeroed interaction metrics', () => {
      const agent = makeAgent()
      db.insertAgent(agent)

      const row = db.getAgent(agent.id)
      expect(row).toMatchObject({ id: agent.id, name: 'Helper', interaction_count: 0, last_interaction_at: null })
    })

    it('returns null for an unknown agent', () => {
      expect(db.getAgent('missing')).toBeNull()
    })

    it('raises ConflictError on a duplicate id', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      expect(() => db.insertAgent(agent)).toThrow(ConflictError)
    })

    it('lists newest first and hides archived unless asked', () => {
      const older = makeAgent({ created_at: '2025-01-01T00:00:00.000Z' })
      const newer = makeAgent({ created_at: '2025-02-01T00:00:00.000Z' })
      const archived = makeAgent({ status: 'archived' })
      db.insertAgent(older)
      db.insertAgent(newer)
      db.insertAgent(archived)

      const base = { tenantId: 't1', includeArchived: false, limit: 50, offset: 0 }
      expect(db.listAgents(base).map(r => r.id)).toEqual([newer.id, older.id])
      expect(db.listAgents({ ...base, status: 'archived' }).map(r => r.id)).toEqual([archived.id])
      expect(db.listAgents({ ...base, includeArchived: true })).toHaveLength(3)
    })

    it('filters by tenant, type and tag with paging', () => {
      db.insertAgent(makeAgent({ type: 'voice', tags: '["sales","vip"]' }))
      db.insertAgent(makeAgent({ tags: '["support"]' }))
      db.insertAgent(makeAgent({ tenant_id: 't2' }))

      const base = { includeArchived: false, limit: 50, offset: 0 }
      expect(db.listAgents({ ...base, tenantId: 't1' })).toHaveLength(2)
      expect(db.listAgents({ ...base, tenantId: 't1', type: 'voice' })).toHaveLength(1)
      expect(db.listAgents({ ...base, tag: 'vip' })).toHaveLength(1)
      expect(db.listAgents({ ...base, tag: 'vi' })).toHaveLength(0)
      expect(db.listAgents({ ...base, limit: 1, offset: 2 })).toHaveLength(1)
    })

    it('applies an update only when the version still matches', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      const write = { name: 'Renamed', type: 'conversational', status: 'active', version: '1.0.1', payload: '{}', tags: '[]', updated_at: '2025-03-01T00:00:00.000Z' }

      expect(db.updateAgentIfVersion(agent.id, '1.0.0', write)).toBe(true)
      expect(db.updateAgentIfVersion(agent.id, '1.0.0', { ...write, name: 'Lost' })).toBe(false)
      expect(db.getAgent(agent.id)?.name).toBe('Renamed')
    })

    it('records interactions outside the versioned payload', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      db.recordAgentInteraction(agent.id, '2025-04-01T00:00:00.000Z')
      db.recordAgentInteraction(agent.id, '2025-04-02T00:00:00.000Z')

      const row = db.getAgent(agent.id)
      expect(row?.interaction_count).toBe(2)
      expect(row?.last_interaction_at).toBe('2025-04-02T00:00:00.000Z')
      expect(row?.version).toBe('1.0.0')
    })

    it('lists ids of non-archived agents, optionally per tenant', () => {
      const a = makeAgent()
      const b = makeAgent({ tenant_id: 't2' })
      db.insertAgent(a)
      db.insertAgent(b)
      db.insertAgent(makeAgent({ status: 'archived' }))

      expect(db.getAgentIds()).toEqual([a.id, b.id])
      expect(db.getAgentIds('t2')).toEqual([b.id])
    })
  })

  describe('contract versions', () => {
    it('stores snapshots oldest first', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      for (const version of ['1.0.0', '1.0.1']) {
        db.insertContractVersion({
          id: generateId(),
          agent_id: agent.id,
          version,
          payload: `{"v":"${version}"}`,
          change_summary: null,
          created_by: 'system',
          created_at: '2025-01-01T00:00:00.000Z',
        })
      }
      expect(db.getContractVersions(agent.id).map(v => v.version)).toEqual(['1.0.0', '1.0.1'])
    })

    it('refuses a second snapshot of the same version', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      const snapshot = {
        agent_id: agent.id,
        version: '1.0.0',
        payload: '{}',
        change_summary: null,
        created_by: 'system',
        created_at: '2025-01-01T00:00:00.000Z',
      }
      db.insertContractVersion({ id: generateId(), ...snapshot })
      expect(() => db.insertContractVersion({ id: generateId(), ...snapshot })).toThrow(ConflictError)
    })
  })

  describe('rendered prompts', () => {
    it('upserts and deletes the cached prompt', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      const row = { agent_id: agent.id, version: '1.0.0', system_prompt: 'a', directives: '[]', rendered_at: '2025-01-01T00:00:00.000Z' }

      db.upsertRenderedPrompt(row)
      db.upsertRenderedPrompt({ ...row, version: '1.0.1', system_prompt: 'b' })
      expect(db.getRenderedPrompt(agent.id)).toMatchObject({ version: '1.0.1', system_prompt: 'b' })

      expect(db.deleteRenderedPrompt(agent.id)).toBe(true)
      expect(db.getRenderedPrompt(agent.id)).toBeNull()
    })
  })

  describe('threads and messages', () => {
    let agentId: string

    beforeEach(() => {
      const agent = makeAgent()
      db.insertAgent(agent)
      agentId = agent.id
    })

    it('returns the most recent messages oldest-first, breaking timestamp ties by insertion', () => {
      const thread = makeThread(agentId)
      db.insertThread(thread)
      const at = '2025-01-01T00:00:00.000Z'
      for (const content of ['one', 'two', 'three', 'four']) {
        db.insertMessage({ id: generateId(), thread_id: thread.id, role: 'user', content, metadata: '{}', created_at: at })
      }

      expect(db.getRecentMessages(thread.id, 3).map(m => m.content)).toEqual(['two', 'three', 'four'])
      expect(db.countMessages(thread.id)).toBe(4)
    })

    it('bumps counters and lists threads for a user', () => {
      const thread = makeThread(agentId)
      db.insertThread(thread)
      db.insertThread(makeThread(agentId, { user_id: 'u2' }))

      db.bumpThreadCounters(thread.id, 2, '2025-05-01T00:00:00.000Z')
      expect(db.getThread(thread.id)).toMatchObject({ message_count: 2, last_message_at: '2025-05-01T00:00:00.000Z' })
      expect(db.listThreads('t1', agentId, 'u1', 10).map(t => t.id)).toEqual([thread.id])
      expect(db.listThreads('t1', agentId, undefined, 10)).toHaveLength(2)
    })

    it('cascades thread deletion to messages', () => {
      const thread = makeThread(agentId)
      db.insertThread(thread)
      db.insertMessage({ id: generateId(), thread_id: thread.id, role: 'user', content: 'x', metadata: '{}', created_at: '2025-01-01T00:00:00.000Z' })

      expect(db.deleteThread(thread.id)).toBe(true)
      expect(db.countMessages(thread.id)).toBe(0)
    })

    it('rejects a message for a missing thread', () => {
      expect(() => db.insertMessage({
        id: generateId(), thread_id: 'missing', role: 'user', content: 'x', metadata: '{}', created_at: '2025-01-01T00:00:00.000Z',
      })).toThrow('Failed to insert message')
    })
  })

  describe('memories', () => {
    it('finds a memory by namespace and content hash', () => {
      const memory = makeMemory({ content_hash: 'abc' })
      db.insertMemory(memory)
      expect(db.findMemoryByHash('t1:a1', 'abc')?.id).toBe(memory.id)
      expect(db.findMemoryByHash('t1:a2', 'abc')).toBeNull()
    })

    it('raises ConflictError on a duplicate hash within a namespace', () => {
      db.insertMemory(makeMemory({ content_hash: 'abc' }))
      expect(() => db.insertMemory(makeMemory({ content_hash: 'abc' }))).toThrow(ConflictError)
    })

    it('counts a namespace with descendants but not prefix siblings', () => {
      db.insertMemory(makeMemory({ namespace: 't1:a1' }))
      db.insertMemory(makeMemory({ namespace: 't1:a1:user:u1' }))
      db.insertMemory(makeMemory({ namespace: 't1:a10' }))

      expect(db.countMemories()).toBe(3)
      expect(db.countMemories('t1:a1')).toBe(2)
      expect(db.countMemoriesExact('t1:a1')).toBe(1)
    })

    it('touches a memory', () => {
      const memory = makeMemory()
      db.insertMemory(memory)
      db.touchMemory(memory.id, '2025-06-01T00:00:00.000Z')

      expect(db.getMemory(memory.id)).toMatchObject({ access_count: 1, last_accessed_at: '2025-06-01T00:00:00.000Z' })
    })

    it('hydrates rows by id', () => {
      const a = makeMemory()
      const b = makeMemory()
      db.insertMemory(a)
      db.insertMemory(b)

      const map = db.getMemoriesByIds([a.id, b.id, 'missing'])
      expect(map.size).toBe(2)
      expect(db.getMemoriesByIds([]).size).toBe(0)
    })

    it('deletes a memory', () => {
      const memory = makeMemory()
      db.insertMemory(memory)
      expect(db.deleteMemory(memory.id)).toBe(true)
      expect(db.getMemory(memory.id)).toBeNull()
    })
  })

  describe('state and stats', () => {
    it('stores state values', () => {
      db.setState('k', 'v1')
      db.setState('k', 'v2')
      expect(db.getState('k')).toBe('v2')
      expect(db.getState('missing')).toBeNull()
    })

    it('reports counts across tables', () => {
      const agent = makeAgent()
      db.insertAgent(agent)
      db.insertAgent(makeAgent({ status: 'archived' }))
      db.insertMemory(makeMemory())

      expect(db.getStats()).toEqual({
        agent_count: 1,
        archived_agent_count: 1,
        version_count: 0,
        thread_count: 0,
        message_count: 0,
        memory_count: 1,
        cached_prompt_count: 0,
        last_validation_at: null,
      })
    })
  })

  describe('transaction', () => {
    it('rolls back every write when the callback throws', () => {
      const agent = makeAgent()
      expect(() => db.transaction(() => {
        db.insertAgent(agent)
        throw new Error('boom')
      })).toThrow('boom')
      expect(db.getAgent(agent.id)).toBeNull()
    })
  })
})

describe('parseJsonColumn', () => {
  it('parses an object', () => {
    expect(parseJsonColumn('{"a":1}', {})).toEqual({ a: 1 })
  })

  it('falls back on arrays and malformed text', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(parseJsonColumn('[1]', {})).toEqual({})
    expect(parseJsonColumn('{oops', { x: true })).toEqual({ x: true })
    vi.restoreAllMocks()
  })
})
