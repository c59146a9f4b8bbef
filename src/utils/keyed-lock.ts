/**
 * Serializes async work per key. Callers on different keys never wait on each other.
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>()

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve()
    let release: () => void = () => {}
    const next = new Promise<void>(r => { release = r })
    const chain = prev.then(() => next)
    this.locks.set(key, chain)
    await prev
    try {
      return await fn()
    } finally {
      release()
      if (this.locks.get(key) === chain) {
        this.locks.delete(key)
      }
    }
  }

  get size(): number {
    return this.locks.size
  }
}
