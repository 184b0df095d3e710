import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { APIError, ValidationError, isRetryableError } from '../errors'
import { fetchWithRetry } from '../retry'

describe('isRetryableError', () => {
  it('retries rate limits, server errors and network failures', () => {
    expect(isRetryableError(new APIError('slow down', 429, 'FRED'))).toBe(true)
    expect(isRetryableError(new APIError('down', 503, 'FRED'))).toBe(true)
    expect(isRetryableError(new TypeError('fetch failed'))).toBe(true)
  })

  it('does not retry client errors or invalid payloads', () => {
    expect(isRetryableError(new APIError('bad request', 400, 'FRED'))).toBe(false)
    expect(isRetryableError(new ValidationError('bad payload'))).toBe(false)
  })
})

describe('fetchWithRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })
  afterEach(() => vi.restoreAllMocks())

  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new APIError('down', 503, 'FRED'))
      .mockRejectedValueOnce(new APIError('down', 503, 'FRED'))
      .mockResolvedValueOnce('ok')

    await expect(fetchWithRetry(fn, { baseDelayMs: 0 })).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('rethrows a non-retryable error immediately', async () => {
    const error = new APIError('not found', 404, 'FRED')
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error)

    await expect(fetchWithRetry(fn, { baseDelayMs: 0 })).rejects.toBe(error)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('gives up after the last attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new APIError('down', 500, 'FRED'))

    await expect(fetchWithRetry(fn, { maxRetries: 2, baseDelayMs: 0 })).rejects.toThrow('down')
    expect(fn).toHaveBeenCalledTimes(2)
  })
})
