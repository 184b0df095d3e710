import { describe, it, expect } from 'vitest'
import { classifyRegime } from '../regime'
import { calendarDates, makeTable, ramp } from '@/lib/analytics/__tests__/helpers'

const dates = calendarDates('2024-01-01', 20)

describe('classifyRegime', () => {
  it('is unknown with less than the lookback of history', () => {
    const table = makeTable(dates.slice(0, 19), { fed_total_assets: ramp(7_000_000, -5_000, 19) })
    expect(classifyRegime(table)).toEqual({ regime: 'UNKNOWN', confidence: 0, signals: [] })
  })

  it('votes QT when the balance sheet shrinks and RRP grows', () => {
    const table = makeTable(dates, {
      fed_total_assets: ramp(7_000_000, -5_000, 20),
      rrp_balance: ramp(400_000, 10_000, 20),
    })

    expect(classifyRegime(table)).toEqual({ regime: 'QT', confidence: 100, signals: ['QT', 'TIGHTENING'] })
  })

  it('returns a neutral 50 on a tied vote', () => {
    const table = makeTable(dates, {
      fed_total_assets: ramp(7_000_000, -5_000, 20),
      rrp_balance: ramp(400_000, -10_000, 20),
    })

    expect(classifyRegime(table)).toEqual({ regime: 'NEUTRAL', confidence: 50, signals: ['QT', 'EASING'] })
  })

  it('counts the latest weekly balance sheet flow as a vote', () => {
    const table = makeTable(dates, {
      fed_total_assets: ramp(7_000_000, 0, 20),
      net_balance_sheet_flow: [...Array.from({ length: 19 }, () => null), 8_000],
    })

    const result = classifyRegime(table)

    expect(result.signals).toEqual(['NEUTRAL', 'QE'])
    expect(result.regime).toBe('QE')
    expect(result.confidence).toBe(50)
  })

  it('is unknown when no signal can be read', () => {
    const table = makeTable(dates, { sofr_rate: ramp(5, 0, 20) })
    expect(classifyRegime(table)).toEqual({ regime: 'UNKNOWN', confidence: 0, signals: [] })
  })
})
