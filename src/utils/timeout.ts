import { CancelledError, ProviderTimeoutError } from '../core/errors.js'

/**
 * Runs `work` with an AbortSignal that fires after `ms` or when `parent` aborts.
 * Rejects with ProviderTimeoutError on timeout and CancelledError on parent abort,
 * even if `work` ignores the signal.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    throw new CancelledError(`${label} cancelled`)
  }

  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  let onParentAbort: (() => void) | undefined

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new ProviderTimeoutError(`${label} timed out after ${ms}ms`))
    }, ms)
    if (parent) {
      onParentAbort = () => {
        controller.abort()
        reject(new CancelledError(`${label} cancelled`))
      }
      parent.addEventListener('abort', onParentAbort, { once: true })
    }
  })

  try {
    return await Promise.race([work(controller.signal), guard])
  } finally {
    clearTimeout(timer)
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort)
    }
  }
}
