import { describe, it, expect, beforeEach } from 'vitest'
import { LanceStorage, namespaceFilter } from './lance.js'
import { loadConfig } from '../core/config.js'
import { generateId } from '../core/ids.js'
import { mkdtempSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const DIMS = 8

function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'lance-test-'))
}

function axis(i: number, tilt: number = 0): number[] {
  const v = new Array<number>(DIMS).fill(0)
  v[i] = 1
  if (tilt) v[(i + 1) % DIMS] = tilt
  return v
}

function record(namespace: string, vector: number[], memoryType: string = 'conversation') {
  return {
    memoryId: generateId(),
    namespace,
    memoryType,
    vector,
    createdAt: new Date().toISOString(),
  }
}

describe('namespaceFilter', () => {
  it('matches exactly when descendants are excluded', () => {
    expect(namespaceFilter('t1:a1', false)).toBe("namespace = 't1:a1'")
  })

  it('adds a prefix clause for descendants', () => {
    expect(namespaceFilter('t1:a1', true)).toBe("(namespace = 't1:a1' OR namespace LIKE 't1:a1:%')")
  })
})

describe('LanceStorage', () => {
  let lance: LanceStorage

  beforeEach(() => {
    const config = loadConfig({ dataDir: makeTempDir(), embeddingDimensions: DIMS })
    lance = new LanceStorage(config)
  })

  it('adds and counts records', async () => {
    expect(await lance.count()).toBe(0)
    await lance.add(record('t1:a1', axis(0)))
    expect(await lance.count()).toBe(1)
  })

  it('ranks by cosine similarity, closest first', async () => {
    const close = record('t1:a1', axis(0, 0.1))
    const far = record('t1:a1', axis(1))
    await lance.add(far)
    await lance.add(close)

    const hits = await lance.search(axis(0), { namespace: 't1:a1', includeDescendants: false, limit: 10 })
    expect(hits.map(h => h.memory_id)).toEqual([close.memoryId, far.memoryId])
    expect(hits[0].similarity).toBeGreaterThan(0.99)
    expect(hits[1].similarity).toBeCloseTo(0, 3)
  })

  it('restricts results to the namespace and optionally its descendants', async () => {
    const own = record('t1:a1', axis(0))
    const user = record('t1:a1:user:u1', axis(0))
    const sibling = record('t1:a10', axis(0))
    const otherTenant = record('t2:a1', axis(0))
    for (const r of [own, user, sibling, otherTenant]) {
      await lance.add(r)
    }

    const exact = await lance.search(axis(0), { namespace: 't1:a1', includeDescendants: false, limit: 10 })
    expect(exact.map(h => h.memory_id)).toEqual([own.memoryId])

    const subtree = await lance.search(axis(0), { namespace: 't1:a1', includeDescendants: true, limit: 10 })
    expect(new Set(subtree.map(h => h.memory_id))).toEqual(new Set([own.memoryId, user.memoryId]))
  })

  it('filters by memory type', async () => {
    await lance.add(record('t1:a1', axis(0), 'conversation'))
    const fact = record('t1:a1', axis(0), 'fact')
    await lance.add(fact)

    const hits = await lance.search(axis(0), { namespace: 't1:a1', includeDescendants: false, limit: 10, memoryType: 'fact' })
    expect(hits.map(h => h.memory_id)).toEqual([fact.memoryId])
  })

  it('rejects wrong vector dimensions', async () => {
    await expect(lance.add(record('t1:a1', [1, 0]))).rejects.toThrow('Vector dimension mismatch: expected 8, got 2')
  })

  it('rejects ids that are not ULIDs', async () => {
    await expect(lance.add({ ...record('t1:a1', axis(0)), memoryId: 'not-a-ulid' })).rejects.toThrow('Invalid memory ID format')
  })

  it('creates the table once under concurrent first writes', async () => {
    await Promise.all([
      lance.add(record('t1:a1', axis(0))),
      lance.add(record('t1:a1', axis(1))),
      lance.add(record('t1:a1', axis(2))),
    ])
    expect(await lance.count()).toBe(3)
  })
})
