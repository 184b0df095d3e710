import { getErrorMessage, isRetryableError } from './errors'

export interface RetryOptions {
  maxRetries?: number
  baseDelayMs?: number
  /** Checked after each failure; returning false rethrows immediately */
  shouldRetry?: (error: unknown) => boolean
}

/**
 * Run `fn` with exponential backoff between attempts
 */
export async function fetchWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, shouldRetry = isRetryableError } = options
  let lastError: unknown = new Error('All retry attempts failed')

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error
      if (!shouldRetry(error) || attempt === maxRetries - 1) break
      const delay = baseDelayMs * Math.pow(2, attempt)
      console.warn(`[retry] attempt ${attempt + 1}/${maxRetries} failed (${getErrorMessage(error)}), retrying in ${delay}ms`)
      await sleep(delay)
    }
  }

  throw lastError
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
