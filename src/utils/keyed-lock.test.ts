import { describe, it, expect } from 'vitest'
import { KeyedLock } from './keyed-lock.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>(r => { resolve = r })
  return { promise, resolve }
}

describe('KeyedLock', () => {
  it('serializes work on the same key', async () => {
    const lock = new KeyedLock()
    const order: string[] = []
    const gate = deferred()

    const first = lock.run('thread-1', async () => {
      order.push('first:start')
      await gate.promise
      order.push('first:end')
    })
    const second = lock.run('thread-1', async () => {
      order.push('second')
    })

    await new Promise(r => setTimeout(r, 0))
    expect(order).toEqual(['first:start'])
    gate.resolve()
    await Promise.all([first, second])
    expect(order).toEqual(['first:start', 'first:end', 'second'])
  })

  it('does not block different keys', async () => {
    const lock = new KeyedLock()
    const gate = deferred()
    const order: string[] = []

    const blocked = lock.run('a', async () => {
      await gate.promise
      order.push('a')
    })
    await lock.run('b', async () => {
      order.push('b')
    })

    expect(order).toEqual(['b'])
    gate.resolve()
    await blocked
    expect(order).toEqual(['b', 'a'])
  })

  it('releases the key after a failure', async () => {
    const lock = new KeyedLock()
    await expect(lock.run('k', async () => { throw new Error('fail') })).rejects.toThrow('fail')
    await expect(lock.run('k', async () => 'ok')).resolves.toBe('ok')
    expect(lock.size).toBe(0)
  })
})
