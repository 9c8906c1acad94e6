import { describe, it, expect, vi } from 'vitest'
import { retryUnreachable, settleWithConcurrency } from '../../../src/util/async.js'
import { AuthenticationError, StoreUnreachableError } from '../../../src/errors.js'

describe('settleWithConcurrency', () => {
  it('keeps results in input order', async () => {
    const results = await settleWithConcurrency([30, 10, 20], 3, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms))
      return ms * 2
    })
    expect(results).toEqual([
      { ok: true, value: 60 },
      { ok: true, value: 20 },
      { ok: true, value: 40 },
    ])
  })

  it('never exceeds the concurrency limit', async () => {
    let active = 0
    let peak = 0
    await settleWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      active++
      peak = Math.max(peak, active)
      await new Promise((resolve) => setTimeout(resolve, 2))
      active--
    })
    expect(peak).toBe(3)
  })

  it('isolates failures to their own item', async () => {
    const boom = new Error('boom')
    const results = await settleWithConcurrency(['a', 'b', 'c'], 2, (item) =>
      item === 'b' ? Promise.reject(boom) : Promise.resolve(item.toUpperCase()),
    )
    expect(results).toEqual([
      { ok: true, value: 'A' },
      { ok: false, error: boom },
      { ok: true, value: 'C' },
    ])
  })

  it('handles an empty list', async () => {
    expect(await settleWithConcurrency([], 4, () => Promise.resolve(1))).toEqual([])
  })
})

describe('retryUnreachable', () => {
  it('retries unreachable failures and then succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StoreUnreachableError('down'))
      .mockResolvedValueOnce('ok')

    expect(await retryUnreachable(fn, { attempts: 3, baseDelayMs: 1 })).toBe('ok')
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('gives up after the configured attempts', async () => {
    const fn = vi.fn(() => Promise.reject(new StoreUnreachableError('down')))
    await expect(retryUnreachable(fn, { attempts: 3, baseDelayMs: 1 })).rejects.toThrow('down')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('does not retry other errors', async () => {
    const fn = vi.fn(() => Promise.reject(new AuthenticationError('denied', 403)))
    await expect(retryUnreachable(fn, { attempts: 3, baseDelayMs: 1 })).rejects.toThrow(
      AuthenticationError,
    )
    expect(fn).toHaveBeenCalledTimes(1)
  })
})
