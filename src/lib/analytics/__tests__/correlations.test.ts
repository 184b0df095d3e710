import { describe, it, expect } from 'vitest'
import { resolveConfig } from '@/lib/config'
import { computeLiquidityCorrelations, pairwiseValid, pearsonCorrelation } from '../correlations'
import { calendarDates, makeTable, ramp } from './helpers'

const config = resolveConfig({
  correlations: {
    pairs: [
      { id: 'a_vs_b', a: ['a'], b: ['b'] },
      { id: 'a_vs_sparse', a: ['a'], b: ['sparse'] },
      { id: 'a_vs_missing', a: ['a'], b: ['missing'] },
    ],
  },
}).correlations

describe('pearsonCorrelation', () => {
  it('is +1 and -1 for perfectly linear series', () => {
    expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10)
    expect(pearsonCorrelation([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 10)
  })

  it('is absent when either side is constant', () => {
    expect(pearsonCorrelation([1, 2, 3], [5, 5, 5])).toBeNull()
  })
})

describe('pairwiseValid', () => {
  it('keeps rows where both sides have a value', () => {
    expect(pairwiseValid([1, null, 3, 4], [10, 20, null, 40])).toEqual({ x: [1, 4], y: [10, 40] })
  })
})

describe('computeLiquidityCorrelations', () => {
  const dates = calendarDates('2024-01-01', 30)
  const a = ramp(0, 1, 30)

  it('correlates configured pairs over the trailing window', () => {
    const sparse = [1, 2, 3, 4, 5, ...Array.from({ length: 25 }, () => null)]
    const table = makeTable(dates, { a, b: a.map((v) => (v === null ? null : 2 * v + 1)), sparse })

    const result = computeLiquidityCorrelations(table, config)

    expect(result.a_vs_b).toBeCloseTo(1, 10)
    expect(result.a_vs_sparse).toBeNull()
    expect(Object.keys(result)).toEqual(['a_vs_b', 'a_vs_sparse'])
  })

  it('returns nothing for a short table', () => {
    const table = makeTable(dates.slice(0, 29), { a: a.slice(0, 29), b: a.slice(0, 29) })
    expect(computeLiquidityCorrelations(table, config)).toEqual({})
  })
})
