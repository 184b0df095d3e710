import { describe, it, expect } from 'vitest'
import { checkDataFreshness, checkHouseholdShareBounds, freshnessStatus, reconcileNetLiquidity } from '../data-validation'
import { makeTable } from '@/lib/analytics/__tests__/helpers'

describe('freshnessStatus', () => {
  it('applies per-frequency lag rules', () => {
    expect(freshnessStatus(1, 'daily')).toBe('OK')
    expect(freshnessStatus(5, 'daily')).toBe('DELAYED')
    expect(freshnessStatus(6, 'daily')).toBe('STALE')
    expect(freshnessStatus(8, 'weekly')).toBe('OK')
    expect(freshnessStatus(9, 'weekly')).toBe('DELAYED')
    expect(freshnessStatus(15, 'unknown')).toBe('STALE')
  })

  it('never flags policy-driven series', () => {
    expect(freshnessStatus(200, 'policy-driven')).toBe('OK')
  })
})

describe('checkDataFreshness', () => {
  it('reports every series sorted by id and warns on stale ones', () => {
    const report = checkDataFreshness(
      { sofr_rate: '2024-03-01', fed_total_assets: '2024-03-10' },
      { sofr_rate: 'daily', fed_total_assets: 'weekly' },
      '2024-03-11'
    )

    expect(report.series).toEqual([
      { seriesId: 'fed_total_assets', lastDate: '2024-03-10', daysOld: 1, frequency: 'weekly', status: 'OK' },
      { seriesId: 'sofr_rate', lastDate: '2024-03-01', daysOld: 10, frequency: 'daily', status: 'STALE' },
    ])
    expect(report.warnings).toEqual(['sofr_rate: last observation 2024-03-01 is 10 days old (STALE)'])
  })

  it('treats a series without a known frequency as unknown', () => {
    const report = checkDataFreshness({ custom: '2024-03-01' }, {}, '2024-03-02')
    expect(report.series[0].frequency).toBe('unknown')
  })
})

describe('checkHouseholdShareBounds', () => {
  it('counts valid shares outside 0-100', () => {
    expect(checkHouseholdShareBounds([10, null, 120, -1])).toEqual({ checked: 3, outOfBounds: 2, passed: false })
  })
})

describe('reconcileNetLiquidity', () => {
  it('flags rows that disagree with assets - RRP - TGA beyond tolerance', () => {
    const table = makeTable(['2024-01-01', '2024-01-02'], {
      net_liquidity: [5_800_000, 5_790_000],
      fed_total_assets: [7_000_000, 7_000_000],
      rrp_balance: [500_000, 500_000],
      tga_balance: [700_000, 700_000],
    })

    expect(reconcileNetLiquidity(table)).toEqual({ checked: 2, mismatches: 1, maxDiscrepancy: 10_000, passed: false })
  })

  it('is absent without the inputs', () => {
    const table = makeTable(['2024-01-01'], { net_liquidity: [1], fed_total_assets: [1], rrp_balance: [0] })
    expect(reconcileNetLiquidity(table)).toBeNull()
  })
})
