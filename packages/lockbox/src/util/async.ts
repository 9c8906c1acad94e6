/**
 * Bounded concurrency and retry helpers for bulk store operations.
 */

import { StoreUnreachableError } from '../errors.js'

/** Outcome of one item processed by {@link settleWithConcurrency}. */
export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown }

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 *
 * Each item's outcome is written to its own index of the result array, so
 * aggregation is race-free and one failure never affects another item.
 */
export async function settleWithConcurrency<I, T>(
  items: readonly I[],
  concurrency: number,
  fn: (item: I, index: number) => Promise<T>,
): Promise<Settled<T>[]> {
  const results = new Array<Settled<T>>(items.length)
  let next = 0

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++
      const item = items[index]
      if (item === undefined) {
        continue
      }
      try {
        results[index] = { ok: true, value: await fn(item, index) }
      } catch (error) {
        results[index] = { ok: false, error }
      }
    }
  }

  const width = Math.max(1, Math.min(concurrency, items.length))
  await Promise.all(Array.from({ length: width }, () => worker()))
  return results
}

/** Options for {@link retryUnreachable}. */
export interface RetryOptions {
  /** Total attempts including the first (default 3). */
  attempts?: number | undefined
  /** Delay before the first retry; doubles each time (default 200ms). */
  baseDelayMs?: number | undefined
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Call `fn`, retrying with exponential backoff while it fails with
 * {@link StoreUnreachableError}. Only for idempotent operations.
 */
export async function retryUnreachable<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options?.attempts ?? 3)
  const baseDelayMs = options?.baseDelayMs ?? 200

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!(err instanceof StoreUnreachableError) || attempt >= attempts) {
        throw err
      }
      await sleep(baseDelayMs * 2 ** (attempt - 1))
    }
  }
}
