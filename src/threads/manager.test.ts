import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ThreadManager, defaultTitle } from './manager.js'
import { SqliteStorage } from '../storage/sqlite.js'
import { ContractStore } from '../contracts/store.js'
import { TraitModulator } from '../modulation/trait-modulator.js'
import { BUILTIN_TRAIT_DEFAULTS } from '../core/config.js'
import { NotFoundError, ValidationError } from '../core/errors.js'
import { makeAgentInput } from '../testing/fakes.js'

describe('ThreadManager', () => {
  let db: SqliteStorage
  let threads: ThreadManager

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    db = SqliteStorage.inMemory()
    const contracts = new ContractStore(db, new TraitModulator(), {
      traits: { ...BUILTIN_TRAIT_DEFAULTS },
      llmProvider: 'anthropic',
      llmModel: 'test-model',
      memoryK: 6,
      threadWindow: 20,
    })
    contracts.create(makeAgentInput({ id: 'a1' }))
    contracts.create(makeAgentInput({ id: 'a2' }))
    threads = new ThreadManager(db)
  })

  describe('getOrCreate', () => {
    it('creates a titled, empty thread', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      expect(thread).toMatchObject({ agent_id: 'a1', user_id: 'u1', tenant_id: 't1', status: 'active', message_count: 0, last_message_at: null })
      expect(thread.title).toMatch(/^Conversation \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/)
    })

    it('reuses a matching active thread', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      expect(threads.getOrCreate('a1', 'u1', 't1', thread.id).id).toBe(thread.id)
    })

    it('starts a new thread for unknown, foreign or archived ids', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')

      expect(threads.getOrCreate('a1', 'u1', 't1', 'nope').id).not.toBe(thread.id)
      expect(threads.getOrCreate('a1', 'u2', 't1', thread.id).id).not.toBe(thread.id)
      expect(threads.getOrCreate('a2', 'u1', 't1', thread.id).id).not.toBe(thread.id)
      expect(threads.getOrCreate('a1', 'u1', 't2', thread.id).id).not.toBe(thread.id)

      threads.archive(thread.id)
      expect(threads.getOrCreate('a1', 'u1', 't1', thread.id).id).not.toBe(thread.id)
    })

    it('rejects a user id that cannot become a namespace segment', () => {
      expect(() => threads.getOrCreate('a1', 'u:1', 't1')).toThrow(ValidationError)
    })
  })

  describe('append and recent', () => {
    it('keeps counters in step and returns the window oldest first', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      threads.append(thread.id, 'user', 'one')
      threads.append(thread.id, 'assistant', 'two', { model: 'm' })
      threads.append(thread.id, 'user', 'three')

      const updated = threads.get(thread.id)
      expect(updated?.message_count).toBe(3)
      expect(updated?.last_message_at).not.toBeNull()

      expect(threads.recent(thread.id, 2).map(m => m.content)).toEqual(['two', 'three'])
      const all = threads.recent(thread.id, 10)
      expect(all.map(m => m.role)).toEqual(['user', 'assistant', 'user'])
      expect(all[1].metadata).toEqual({ model: 'm' })
      expect(threads.recent(thread.id, 0)).toEqual([])
    })

    it('refuses to append to a missing thread', () => {
      expect(() => threads.append('missing', 'user', 'hi')).toThrow(NotFoundError)
    })
  })

  describe('appendMany', () => {
    it('writes all turns or none', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      vi.spyOn(db, 'bumpThreadCounters').mockImplementationOnce(() => {
        throw new Error('disk full')
      })

      expect(() => threads.appendMany(thread.id, [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi' },
      ])).toThrow('disk full')
      expect(db.countMessages(thread.id)).toBe(0)
      expect(threads.get(thread.id)?.message_count).toBe(0)

      threads.appendMany(thread.id, [
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'hi' },
      ])
      expect(threads.recent(thread.id, 10).map(m => m.content)).toEqual(['hello', 'hi'])
      expect(threads.get(thread.id)?.message_count).toBe(2)
    })
  })

  describe('list, archive and delete', () => {
    it('lists per agent and optionally per user', () => {
      threads.getOrCreate('a1', 'u1', 't1')
      threads.getOrCreate('a1', 'u2', 't1')
      threads.getOrCreate('a2', 'u1', 't1')

      expect(threads.list('t1', 'a1')).toHaveLength(2)
      expect(threads.list('t1', 'a1', { userId: 'u2' }).map(t => t.user_id)).toEqual(['u2'])
      expect(threads.list('t2', 'a1')).toEqual([])
    })

    it('archives once', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      expect(threads.archive(thread.id)).toBe(true)
      expect(threads.archive(thread.id)).toBe(false)
      expect(threads.get(thread.id)?.status).toBe('archived')
    })

    it('deletes messages with the thread', () => {
      const thread = threads.getOrCreate('a1', 'u1', 't1')
      threads.append(thread.id, 'user', 'hello')

      expect(threads.delete(thread.id)).toBe(true)
      expect(threads.get(thread.id)).toBeNull()
      expect(db.countMessages(thread.id)).toBe(0)
      expect(db.getStats().message_count).toBe(0)
    })
  })
})

describe('defaultTitle', () => {
  it('formats the UTC minute', () => {
    expect(defaultTitle(new Date('2025-03-04T05:06:59.000Z'))).toBe('Conversation 2025-03-04 05:06')
  })
})
