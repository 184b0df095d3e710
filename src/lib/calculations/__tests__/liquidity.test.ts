import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { deriveMetrics, monthToDateChange, monthToDateSum, normalizeUnits } from '../liquidity'
import { calendarDates, makeTable, silenceConsole } from '@/lib/analytics/__tests__/helpers'

describe('normalizeUnits', () => {
  it('rescales monetary columns to the base unit and leaves rates alone', () => {
    const table = makeTable(['2024-01-01'], { rrp_balance: [500], sofr_rate: [5.3] }, { rrp_balance: 'billions', sofr_rate: 'percent' })

    expect(normalizeUnits(table, 'millions')).toEqual(['rrp_balance'])
    expect(table.columns.rrp_balance).toEqual([500_000])
    expect(table.columns.sofr_rate).toEqual([5.3])
    expect(normalizeUnits(table, 'millions')).toEqual([])
    expect(table.columns.rrp_balance).toEqual([500_000])
  })
})

describe('deriveMetrics', () => {
  beforeEach(() => silenceConsole())
  afterEach(() => vi.restoreAllMocks())

  it('computes net liquidity after unit normalization', () => {
    const table = makeTable(
      ['2024-01-01', '2024-01-02'],
      { fed_total_assets: [7_000_000, 7_000_000], rrp_balance: [500, 400], tga_balance: [700, 750] },
      { fed_total_assets: 'millions', rrp_balance: 'billions', tga_balance: 'billions' }
    )

    const report = deriveMetrics(table)

    expect(report.netLiquidityVariant).toBe('full')
    expect(report.netLiquidityColumn).toBe('net_liquidity')
    expect(table.columns.net_liquidity).toEqual([5_800_000, 5_850_000])
    expect(table.columns.rrp_balance_change).toEqual([null, -100_000])
  })

  it('produces the same table when run twice', () => {
    const table = makeTable(
      ['2024-01-01', '2024-01-02', '2024-01-03'],
      { fed_total_assets: [7_000_000, 6_990_000, 6_980_000], rrp_balance: [500, 450, 420], tga_balance: [700, 720, 710] },
      { rrp_balance: 'billions', tga_balance: 'billions' }
    )

    deriveMetrics(table)
    const first = structuredClone(table)
    deriveMetrics(table)

    expect(table).toEqual(first)
  })

  it('falls back to assets minus RRP when the TGA is missing', () => {
    const table = makeTable(['2024-01-01'], { fed_total_assets: [7_000_000], rrp_balance: [400_000], tga_balance: [null] })

    const report = deriveMetrics(table)

    expect(report.netLiquidityVariant).toBe('ex-tga')
    expect(table.columns.net_liquidity_ex_tga).toEqual([6_600_000])
    expect(table.columns.net_liquidity).toBeUndefined()
  })

  it('reports net liquidity as unavailable without RRP', () => {
    const table = makeTable(['2024-01-01'], { fed_total_assets: [7_000_000] })

    const report = deriveMetrics(table)

    expect(report.netLiquidityVariant).toBe('unavailable')
    expect(report.netLiquidityColumn).toBeNull()
    expect(report.omitted).toContainEqual({ id: 'net_liquidity', missing: ['rrp_balance'] })
  })

  it('expresses money-market spreads in basis points and curves in percent', () => {
    const table = makeTable(
      ['2024-01-01'],
      { sofr_rate: [5.33], iorb_rate: [5.4], ust_2y: [4.5], ust_10y: [4.2] },
      { sofr_rate: 'percent', iorb_rate: 'percent', ust_2y: 'percent', ust_10y: 'percent' }
    )

    const report = deriveMetrics(table)

    expect(table.columns.spread_sofr_iorb[0]).toBeCloseTo(-7, 10)
    expect(table.units.spread_sofr_iorb).toBe('basis-points')
    expect(table.columns.curve_2s10s[0]).toBeCloseTo(-0.3, 10)
    expect(table.units.curve_2s10s).toBe('percent')
    expect(report.omitted).toContainEqual({ id: 'spread_effr_iorb', missing: ['effr_rate'] })
  })

  it('keeps reinvestment out of the net balance sheet flow', () => {
    const dates = calendarDates('2024-01-01', 6)
    const table = makeTable(dates, {
      fed_total_assets: [1_000, 1_000, 1_000, 1_000, 1_000, 994],
      fed_mbs_holdings: [100, 100, 100, 100, 100, 90],
      fed_bill_holdings: [50, 50, 50, 50, 50, 54],
      repo_ops_balance: [0, 0, 0, 0, 0, 0],
    })

    deriveMetrics(table)

    expect(table.columns.mbs_runoff_weekly[5]).toBe(10)
    expect(table.columns.bill_purchases_weekly[5]).toBe(4)
    expect(table.columns.mbs_to_bills_reinvestment).toEqual([0, 0, 0, 0, 0, 4])
    expect(table.columns.net_balance_sheet_flow[5]).toBe(-6)
    expect(table.columns.qt_pace_nominal[5]).toBe(6)
    expect(table.columns.qualitative_easing_support[5]).toBe(4)
  })

  it('flags SOFR trading above IORB by more than the margin', () => {
    const table = makeTable(
      ['2024-01-01', '2024-01-02'],
      { sofr_rate: [5.3, 5.5], iorb_rate: [5.4, 5.4] },
      { sofr_rate: 'percent', iorb_rate: 'percent' }
    )

    deriveMetrics(table)

    expect(table.columns.stress_flag).toEqual([0, 1])
    expect(table.columns.sofr_vol_5d[0]).toBeNull()
    expect(table.columns.sofr_vol_5d[1]).toBeCloseTo(Math.sqrt(0.02), 10)
  })

  it('bridges a gap for horizon changes but not for the daily change', () => {
    const table = makeTable(calendarDates('2024-01-01', 7), { rrp_balance: [100, null, 120, 130, 140, 150, 160] })

    deriveMetrics(table)

    expect(table.columns.rrp_balance_change).toEqual([null, null, null, 10, 10, 10, 10])
    expect(table.columns.rrp_balance_weekly_change).toEqual([null, null, null, null, null, 50, 60])
  })
})

describe('month-to-date helpers', () => {
  const dates = ['2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02']

  it('measures change from the first valid value of the month', () => {
    expect(monthToDateChange(dates, [10, 15, 20, 23])).toEqual([0, 5, 0, 3])
  })

  it('accumulates within the month and restarts at the boundary', () => {
    expect(monthToDateSum(dates, [1, null, 2, 3])).toEqual([1, null, 2, 5])
  })
})
