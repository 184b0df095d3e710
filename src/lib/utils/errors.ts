import type { ZodIssue } from 'zod'

/**
 * Custom error classes shared by the engine and its adapters
 */
export class APIError extends Error {
  constructor(message: string, public statusCode: number, public provider: string) {
    super(message)
    this.name = 'APIError'
  }
}

export class StoreError extends Error {
  constructor(message: string, public operation: 'get' | 'set') {
    super(message)
    this.name = 'StoreError'
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Raised when caller-supplied configuration overrides fail schema validation
 */
export class ConfigError extends Error {
  constructor(public issues: ZodIssue[]) {
    super(`Invalid engine configuration: ${issues.map(formatIssue).join('; ')}`)
    this.name = 'ConfigError'
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${path}: ${issue.message}`
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}

/**
 * Rate-limited responses are worth retrying; other 4xx responses are not
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof APIError) return error.statusCode === 429 || error.statusCode >= 500
  return !(error instanceof ValidationError)
}
