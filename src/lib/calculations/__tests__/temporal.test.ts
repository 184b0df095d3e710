import { describe, it, expect } from 'vitest'
import { resolveConfig } from '@/lib/config'
import {
  boundedPercentChange,
  changeWithinPeriod,
  percentChangeFromCurrent,
  periodWindow,
  summarizeTemporal,
  trailingPercentileRank,
} from '../temporal'
import { calendarDates, makeTable } from '@/lib/analytics/__tests__/helpers'

describe('boundedPercentChange', () => {
  it('returns the percent change inside the bound', () => {
    expect(boundedPercentChange(10, 100)).toBe(10)
  })

  it('suppresses implausible results and non-positive baselines to 0', () => {
    expect(boundedPercentChange(1_200, 100)).toBe(0)
    expect(boundedPercentChange(10, 0)).toBe(0)
    expect(boundedPercentChange(10, -50)).toBe(0)
  })

  it('derives the baseline from the current value', () => {
    expect(percentChangeFromCurrent(110, 10)).toBe(10)
  })

  it('suppresses a change larger than the value it ends at', () => {
    expect(percentChangeFromCurrent(100, 1_200)).toBe(0)
  })
})

describe('changeWithinPeriod', () => {
  it('starts from the first valid observation when the period opens on a gap', () => {
    const dates = calendarDates('2024-02-28', 6)
    const month = periodWindow(dates, 'month')

    expect(month).toEqual({ kind: 'month', start: '2024-03-01', end: '2024-03-04', sessions: 4 })
    expect(month && changeWithinPeriod(dates, [1, 2, null, 10, 12, 15], month)).toBe(5)
  })

  it('needs two valid observations inside the period', () => {
    const dates = calendarDates('2024-02-28', 6)
    const month = periodWindow(dates, 'month')

    expect(month && changeWithinPeriod(dates, [1, 2, null, null, 12, null], month)).toBeNull()
  })
})

describe('trailingPercentileRank', () => {
  it('counts trailing values strictly below the current one', () => {
    expect(trailingPercentileRank([1, 2, 3, 4, 5], 5)).toBe(80)
    expect(trailingPercentileRank([1, 2, 3, 5, 5], 5)).toBe(60)
  })

  it('is absent with a short history', () => {
    expect(trailingPercentileRank([1, 2, 3], 5)).toBeNull()
  })
})

describe('periodWindow', () => {
  const dates = ['2024-03-28', '2024-03-29', '2024-04-01', '2024-04-02']

  it('opens month and quarter windows on the calendar boundary', () => {
    expect(periodWindow(dates, 'month')).toEqual({ kind: 'month', start: '2024-04-01', end: '2024-04-02', sessions: 2 })
    expect(periodWindow(dates, 'quarter')).toEqual({ kind: 'quarter', start: '2024-04-01', end: '2024-04-02', sessions: 2 })
  })

  it('counts quarters from the configured fiscal year start', () => {
    expect(periodWindow(dates, 'quarter', { fiscalYearStartMonth: 2, rollingSessions: 63 })).toEqual({
      kind: 'quarter',
      start: '2024-02-01',
      end: '2024-04-02',
      sessions: 4,
    })
  })

  it('takes the last N sessions for the rolling window', () => {
    expect(periodWindow(dates, 'rolling', { fiscalYearStartMonth: 1, rollingSessions: 3 })).toEqual({
      kind: 'rolling',
      start: '2024-03-29',
      end: '2024-04-02',
      sessions: 3,
    })
  })
})

describe('summarizeTemporal', () => {
  const config = resolveConfig({ temporal: { percentileWindow: 6, trendSlopeThreshold: 5 } }).temporal
  const table = makeTable(['2024-01-29', '2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02', '2024-02-03'], {
    x: [100, 110, null, 120, 130, 125],
    x_change: [null, 10, null, null, 10, -5],
  })

  it('summarizes month-to-date from the first valid observation of the month', () => {
    const { mtd } = summarizeTemporal(table, 'x', config)

    expect(mtd?.window.sessions).toBe(3)
    expect(mtd?.firstValid).toEqual({ date: '2024-02-01', value: 120 })
    expect(mtd?.change).toBe(5)
    expect(mtd?.changePct).toBeCloseTo((5 / 120) * 100, 10)
    expect(mtd?.average).toBe(125)
    expect(mtd?.min).toBe(120)
    expect(mtd?.max).toBe(130)
    expect(mtd?.std).toBe(5)
    expect(mtd?.flow).toBe(5)
  })

  it('annualizes the quarter-to-date change per session', () => {
    const { qtd } = summarizeTemporal(table, 'x', config)

    expect(qtd?.change).toBe(25)
    expect(qtd?.changePct).toBe(25)
    expect(qtd?.annualizedPace).toBeCloseTo(1_050, 8)
  })

  it('ranks and labels the rolling window', () => {
    const { rolling3m } = summarizeTemporal(table, 'x', config)

    expect(rolling3m?.percentile).toBe(60)
    expect(rolling3m?.trend).toBe('Rising')
  })

  it('returns empty summaries for a missing column', () => {
    expect(summarizeTemporal(table, 'missing', config)).toEqual({ column: 'missing', mtd: null, qtd: null, rolling3m: null })
  })
})
