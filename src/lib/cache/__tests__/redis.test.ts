import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { StoreError } from '@/lib/utils/errors'
import type { AnalysisSummary, CompositeIndexRecord } from '@/lib/analytics/types'
import { SNAPSHOT_TTL, SnapshotStore, type KeyValueClient } from '../redis'

class MemoryClient implements KeyValueClient {
  readonly entries = new Map<string, { value: unknown; ex: number }>()

  async get(key: string): Promise<unknown> {
    return this.entries.get(key)?.value ?? null
  }

  async set(key: string, value: unknown, opts: { ex: number }): Promise<unknown> {
    this.entries.set(key, { value, ex: opts.ex })
    return 'OK'
  }
}

const summary: AnalysisSummary = {
  asOf: '2024-03-15',
  netLiquidityVariant: 'full',
  temporal: [],
  spikes: null,
  stress: { score: 12, level: 'LOW', components: [], componentsAvailable: 5 },
  regime: { regime: 'QT', confidence: 100, signals: ['QT'] },
  correlations: {},
  forecasts: [],
  alerts: [],
  freshness: { series: [], warnings: [] },
  fiscal: null,
}

const records: CompositeIndexRecord[] = [
  { date: '2024-03-15', subIndices: { fiscal: 0.5 }, composite: 0.2, compositeFast: null, compositeSlow: null, band: 'Neutral' },
]

describe('SnapshotStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })
  afterEach(() => vi.restoreAllMocks())

  it('writes the dated key and the latest alias with a TTL', async () => {
    const client = new MemoryClient()
    const store = new SnapshotStore(client, { namespace: 'test' })

    await expect(store.saveSummary(summary)).resolves.toBe(true)

    expect([...client.entries.keys()]).toEqual(['test:summary:2024-03-15', 'test:summary:latest'])
    expect(client.entries.get('test:summary:latest')?.ex).toBe(SNAPSHOT_TTL.SUMMARY)
    await expect(store.loadSummary()).resolves.toEqual(summary)
    await expect(store.loadSummary('2024-03-15')).resolves.toEqual(summary)
  })

  it('round-trips composite records', async () => {
    const store = new SnapshotStore(new MemoryClient(), { namespace: 'test' })

    await store.saveComposite('2024-03-15', records)

    await expect(store.loadComposite()).resolves.toEqual(records)
  })

  it('returns null for a missing or malformed entry', async () => {
    const client = new MemoryClient()
    const store = new SnapshotStore(client, { namespace: 'test' })
    await client.set('test:composite:latest', { not: 'records' }, { ex: 60 })

    await expect(store.loadSummary()).resolves.toBeNull()
    await expect(store.loadComposite()).resolves.toBeNull()
    expect(console.warn).toHaveBeenCalledWith('[store] ignoring malformed value under test:composite:latest')
  })

  it('records client failures instead of throwing', async () => {
    const failing: KeyValueClient = {
      get: vi.fn(async () => {
        throw new Error('connection refused')
      }),
      set: vi.fn(async () => {
        throw new Error('connection refused')
      }),
    }
    const store = new SnapshotStore(failing, { namespace: 'test' })

    await expect(store.saveSummary(summary)).resolves.toBe(false)
    expect(store.lastError).toBeInstanceOf(StoreError)
    expect(store.lastError?.operation).toBe('set')

    await expect(store.loadSummary()).resolves.toBeNull()
    expect(store.lastError?.message).toBe('get test:summary:latest failed: connection refused')
  })
})
