export interface RetryOptions {
  attempts: number
  backoffMs: number
  /** Aborting stops further attempts and rejects with the abort reason. */
  signal?: AbortSignal
  onRetry?: (attempt: number, error: unknown) => void
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Retries an async operation with fixed backoff.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    if (options.signal?.aborted) throw options.signal.reason
    try {
      return await fn()
    } catch (error) {
      lastError = error
      if (options.signal?.aborted) throw error
      if (attempt < options.attempts) {
        options.onRetry?.(attempt, error)
        await delay(options.backoffMs, options.signal)
      }
    }
  }

  throw lastError
}
