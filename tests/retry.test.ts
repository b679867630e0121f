import { describe, expect, it, vi } from 'vitest'

import { retry } from '../src/core/retry.js'

describe('retry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok')
    const onRetry = vi.fn()

    await expect(retry(fn, { attempts: 3, backoffMs: 0, onRetry })).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenCalledWith(1, new Error('flaky'))
  })

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('first')).mockRejectedValueOnce(new Error('second'))

    await expect(retry(fn, { attempts: 2, backoffMs: 0 })).rejects.toThrow('second')
  })

  it('stops waiting when aborted during backoff', async () => {
    const controller = new AbortController()
    const fn = vi.fn(async () => {
      throw new Error('down')
    })

    const pending = retry(fn, { attempts: 5, backoffMs: 60_000, signal: controller.signal })
    await vi.waitFor(() => expect(fn).toHaveBeenCalledTimes(1))
    controller.abort(new Error('cancelled'))

    await expect(pending).rejects.toThrow('cancelled')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('does not start when already aborted', async () => {
    const controller = new AbortController()
    controller.abort(new Error('gone'))
    const fn = vi.fn(async () => 'never')

    await expect(retry(fn, { attempts: 2, backoffMs: 0, signal: controller.signal })).rejects.toThrow('gone')
    expect(fn).not.toHaveBeenCalled()
  })
})
