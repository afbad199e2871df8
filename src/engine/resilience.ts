/**
 * Ledgerwise - Timeouts & Retries
 * Every call to an external service is bounded in time and retried at
 * most a fixed number of times.
 */

import { UpstreamError } from './errors'
import type { UpstreamService } from './errors'
import type { Logger } from './logger'

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = ms => new Promise(r => setTimeout(r, ms))

export interface RetryPolicy {
  /** Retries after the first attempt */
  retries: number
  /** Delay before retry n is baseDelayMs * 2^(n-1) */
  baseDelayMs: number
  sleep?: Sleep
  log?: Logger
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt
}

/**
 * Run `op` until it succeeds, a non-retryable error is thrown, or the
 * retry budget runs out. The last error is rethrown.
 */
export async function withRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  isRetryable: (e: unknown) => boolean = e => e instanceof UpstreamError && e.retryable,
): Promise<T> {
  const wait = policy.sleep ?? sleep
  for (let attempt = 0; ; attempt++) {
    try {
      return await op(attempt)
    } catch (e) {
      if (attempt >= policy.retries || !isRetryable(e)) throw e
      const delay = backoffDelay(attempt, policy.baseDelayMs)
      policy.log?.warn(`attempt ${attempt + 1} failed, retrying in ${delay}ms`, e instanceof Error ? e.message : e)
      await wait(delay)
    }
  }
}

/** Reject with an UpstreamError timeout if `promise` does not settle within `ms` */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  service: UpstreamService,
  label = 'operation',
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UpstreamError(`${label} timed out after ${ms}ms`, service, 'timeout')), ms)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}
