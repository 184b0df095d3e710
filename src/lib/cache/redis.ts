import { Redis } from '@upstash/redis'
import { CONFIG } from '@/lib/config'
import type { AnalysisSummary, CompositeIndexRecord } from '@/lib/analytics/types'
import { StoreError, getErrorMessage } from '@/lib/utils/errors'

/**
 * The subset of a Redis client the snapshot store needs. `@upstash/redis`
 * satisfies it; tests pass an in-memory map.
 */
export interface KeyValueClient {
  get(key: string): Promise<unknown>
  set(key: string, value: unknown, opts: { ex: number }): Promise<unknown>
}

export const SNAPSHOT_KEYS = {
  SUMMARY: (namespace: string, asOf: string) => `${namespace}:summary:${asOf}`,
  COMPOSITE: (namespace: string, asOf: string) => `${namespace}:composite:${asOf}`,
  LATEST: 'latest',
} as const

export const SNAPSHOT_TTL = {
  SUMMARY: 60 * 60 * 24 * 7, // 7 days
  COMPOSITE: 60 * 60 * 24 * 7,
} as const

export function createRedisFromEnv(env: NodeJS.ProcessEnv = process.env): KeyValueClient | null {
  const url = env.UPSTASH_REDIS_REST_URL
  const token = env.UPSTASH_REDIS_REST_TOKEN
  if (!url || !token) {
    console.warn('[store] Redis environment variables are missing: UPSTASH_REDIS_REST_URL, UPSTASH_REDIS_REST_TOKEN')
    return null
  }
  return new Redis({ url, token })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isAnalysisSummary(value: unknown): value is AnalysisSummary {
  return isRecord(value) && typeof value.asOf === 'string' && Array.isArray(value.temporal) && isRecord(value.regime)
}

export function isCompositeRecords(value: unknown): value is CompositeIndexRecord[] {
  return Array.isArray(value) && value.every((r) => isRecord(r) && typeof r.date === 'string' && typeof r.composite === 'number')
}

/**
 * Persists analysis summaries and composite series under `<namespace>:<kind>:<asOf>`
 * plus a `latest` alias. Store failures never reach the caller's analysis:
 * reads return null, writes return false, and the error is kept in `lastError`.
 */
export class SnapshotStore {
  lastError: StoreError | null = null
  private readonly namespace: string

  constructor(
    private readonly client: KeyValueClient,
    options: { namespace?: string } = {}
  ) {
    this.namespace = options.namespace ?? CONFIG.cache.namespace
  }

  private async read<T>(key: string, guard: (value: unknown) => value is T): Promise<T | null> {
    try {
      const value = await this.client.get(key)
      if (value === null || value === undefined) {
        console.log(`[store] miss for ${key}`)
        return null
      }
      if (!guard(value)) {
        console.warn(`[store] ignoring malformed value under ${key}`)
        return null
      }
      console.log(`[store] hit for ${key}`)
      return value
    } catch (error) {
      this.lastError = new StoreError(`get ${key} failed: ${getErrorMessage(error)}`, 'get')
      console.warn(`[store] ${this.lastError.message}`)
      return null
    }
  }

  private async write(keys: string[], value: unknown, ttlSeconds: number): Promise<boolean> {
    try {
      for (const key of keys) {
        await this.client.set(key, value, { ex: ttlSeconds })
      }
      return true
    } catch (error) {
      this.lastError = new StoreError(`set ${keys.join(', ')} failed: ${getErrorMessage(error)}`, 'set')
      console.warn(`[store] ${this.lastError.message}`)
      return false
    }
  }

  async saveSummary(summary: AnalysisSummary): Promise<boolean> {
    return this.write(
      [SNAPSHOT_KEYS.SUMMARY(this.namespace, summary.asOf), SNAPSHOT_KEYS.SUMMARY(this.namespace, SNAPSHOT_KEYS.LATEST)],
      summary,
      SNAPSHOT_TTL.SUMMARY
    )
  }

  async loadSummary(asOf: string = SNAPSHOT_KEYS.LATEST): Promise<AnalysisSummary | null> {
    return this.read(SNAPSHOT_KEYS.SUMMARY(this.namespace, asOf), isAnalysisSummary)
  }

  async saveComposite(asOf: string, records: CompositeIndexRecord[]): Promise<boolean> {
    return this.write(
      [SNAPSHOT_KEYS.COMPOSITE(this.namespace, asOf), SNAPSHOT_KEYS.COMPOSITE(this.namespace, SNAPSHOT_KEYS.LATEST)],
      records,
      SNAPSHOT_TTL.COMPOSITE
    )
  }

  async loadComposite(asOf: string = SNAPSHOT_KEYS.LATEST): Promise<CompositeIndexRecord[] | null> {
    return this.read(SNAPSHOT_KEYS.COMPOSITE(this.namespace, asOf), isCompositeRecords)
  }
}
