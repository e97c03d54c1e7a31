/** Largest delay Node timers honour; longer delays fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647

export function timerDelay(ms: number): number {
  return Math.min(MAX_TIMER_MS, Math.max(0, ms))
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs} ms`)
    this.name = 'TimeoutError'
  }
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with a TimeoutError at the deadline even when `fn` ignores
 * the signal.
 */
export async function withTimeout<T>(timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs)
      controller.abort(err)
      reject(err)
    }, timerDelay(timeoutMs))
  })
  try {
    return await Promise.race([fn(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
  }
}

/** Resolves after `ms`, or early once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve()
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, timerDelay(ms))
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/** Exponential backoff: base, 2×base, 4×base, ... capped at `maxMs`. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1))
}
