import { describe, it, expect, afterEach, vi } from 'vitest'
import { withTimeout } from './timeout.js'
import { CancelledError, ProviderTimeoutError } from '../core/errors.js'

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('resolves with the work result when it finishes in time', async () => {
    const result = await withTimeout(async () => 42, 1000, 'answer')
    expect(result).toBe(42)
  })

  it('propagates errors from the work itself', async () => {
    await expect(
      withTimeout(async () => { throw new Error('upstream 500') }, 1000, 'call'),
    ).rejects.toThrow('upstream 500')
  })

  it('rejects with ProviderTimeoutError and aborts the signal', async () => {
    vi.useFakeTimers()
    let seen: AbortSignal | undefined
    const pending = withTimeout(signal => {
      seen = signal
      return new Promise<string>(() => {})
    }, 50, 'embedding')
    const assertion = expect(pending).rejects.toThrow(ProviderTimeoutError)
    await vi.advanceTimersByTimeAsync(60)
    await assertion
    await expect(pending).rejects.toThrow('embedding timed out after 50ms')
    expect(seen?.aborted).toBe(true)
  })

  it('rejects immediately when the parent is already aborted', async () => {
    const parent = new AbortController()
    parent.abort()
    const work = vi.fn(async () => 'never')
    await expect(withTimeout(work, 1000, 'completion', parent.signal)).rejects.toThrow(CancelledError)
    expect(work).not.toHaveBeenCalled()
  })

  it('rejects with CancelledError when the parent aborts mid-flight', async () => {
    const parent = new AbortController()
    const pending = withTimeout(() => new Promise<string>(() => {}), 10000, 'completion', parent.signal)
    parent.abort()
    await expect(pending).rejects.toThrow('completion cancelled')
  })
})
