import { describe, it, expect } from 'vitest'
import { applyTransform, combineColumns, defineTransform, firstPresent, isPresent } from '../table'
import type { DerivationReport } from '../types'
import { makeTable } from './helpers'

function emptyReport(): Pick<DerivationReport, 'applied' | 'omitted'> {
  return { applied: [], omitted: [] }
}

const sumTransform = defineTransform({
  id: 'sum',
  required: ['a', 'b'],
  optional: ['c'],
  outputs: { a_plus_b: 'millions' },
  compute: (inputs) => {
    const c = inputs.optional('c')
    const sum = combineColumns(inputs.required('a'), inputs.required('b'), (x, y) => x + y)
    return { a_plus_b: c ? combineColumns(sum, c, (x, y) => x + y) : sum }
  },
})

describe('isPresent', () => {
  it('treats an all-null column as absent', () => {
    const table = makeTable(['2024-01-01'], { a: [null], b: [1] })
    expect(isPresent(table, 'a')).toBe(false)
    expect(isPresent(table, 'b')).toBe(true)
    expect(firstPresent(table, ['missing', 'a', 'b'])).toBe('b')
  })
})

describe('applyTransform', () => {
  it('writes outputs and records the transform as applied', () => {
    const table = makeTable(['2024-01-01', '2024-01-02'], { a: [1, 2], b: [10, null] })
    const report = emptyReport()

    expect(applyTransform(table, sumTransform, report)).toBe(true)
    expect(table.columns.a_plus_b).toEqual([11, null])
    expect(table.units.a_plus_b).toBe('millions')
    expect(report).toEqual({ applied: ['sum'], omitted: [] })
  })

  it('uses optional inputs only when they hold values', () => {
    const table = makeTable(['2024-01-01'], { a: [1], b: [2], c: [3] })
    applyTransform(table, sumTransform, emptyReport())
    expect(table.columns.a_plus_b).toEqual([6])
  })

  it('omits the transform and names the missing inputs', () => {
    const table = makeTable(['2024-01-01'], { a: [1], b: [null] })
    const report = emptyReport()

    expect(applyTransform(table, sumTransform, report)).toBe(false)
    expect(report.omitted).toEqual([{ id: 'sum', missing: ['b'] }])
    expect(table.columns.a_plus_b).toBeUndefined()
  })
})
