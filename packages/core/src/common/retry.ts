/**
 * Exponential-backoff retry for transient I/O.
 * Non-transient errors and aborts are rethrown without another attempt.
 */

import { CaseKBError, isTransientError } from './errors.js'

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
}

export interface RetryOptions {
  signal?: AbortSignal
  /** Label used in log lines. */
  label?: string
  /** Called once per retry (not for the first attempt). */
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void
  shouldRetry?: (err: unknown) => boolean
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * 2 ** (attempt - 1)
  return Math.min(raw, policy.maxDelayMs)
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(CaseKBError.cancelled())
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(CaseKBError.cancelled())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError
  let attempt = 1

  for (;;) {
    if (options.signal?.aborted) throw CaseKBError.cancelled()
    try {
      return await fn()
    } catch (err) {
      if (attempt >= policy.maxAttempts || !shouldRetry(err)) throw err

      const delayMs = backoffDelay(policy, attempt)
      const message = err instanceof Error ? err.message : String(err)
      console.warn(`[retry] ${options.label ?? 'operation'} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delayMs}ms: ${message}`)
      options.onRetry?.(attempt, err, delayMs)

      await sleep(delayMs, options.signal)
      attempt++
    }
  }
}
