import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { DEFAULT_CONFIG, getSeriesMetadata, resolveConfig, runLiquidityAnalysis, SnapshotStore, type SeriesMap } from '@/index'
import { silenceConsole } from '@/lib/analytics/__tests__/helpers'

describe('package entry', () => {
  beforeEach(() => silenceConsole())
  afterEach(() => vi.restoreAllMocks())

  it('exposes the engine, its configuration and the snapshot store', () => {
    expect(resolveConfig().baseUnit).toBe(DEFAULT_CONFIG.baseUnit)
    expect(getSeriesMetadata('RRPONTSYD')?.column).toBe('rrp_balance')
    expect(typeof SnapshotStore).toBe('function')
  })

  it('runs an analysis end to end', () => {
    const series: SeriesMap = {
      rrp_balance: {
        id: 'rrp_balance',
        frequency: 'daily',
        units: 'millions',
        observations: [
          { date: '2024-01-02', value: 400 },
          { date: '2024-01-03', value: 380 },
        ],
      },
    }

    const { table, derivation } = runLiquidityAnalysis(series, { reportDate: '2024-01-04' })

    expect(table.dates).toEqual(['2024-01-02', '2024-01-03'])
    expect(table.columns.rrp_balance_change).toEqual([null, -20])
    expect(derivation.netLiquidityVariant).toBe('unavailable')
  })
})
