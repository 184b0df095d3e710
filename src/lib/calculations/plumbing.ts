/**
 * Market Plumbing
 *
 * Repo facility take-up and settlement fails, the two inputs of the plumbing
 * sub-index of the composite.
 */

import { DEFAULT_CONFIG, type PlumbingConfig } from '@/lib/config'
import { isValid, mean, rollingMean, sampleStd, validValues } from '@/lib/analytics/rolling'
import { applyTransform, defineTransform, isPresent, mapColumn, nullColumn } from '@/lib/analytics/table'
import type { AlignedTable, Column, DerivationReport, Units } from '@/lib/analytics/types'

const FAILS_MA_SHORT = 5
const FAILS_MA_LONG = 20

/**
 * submitted / operation limit. A row with either input gets a ratio; one the
 * division cannot produce (no limit, zero limit) is 0.
 */
export function submissionRatio(submitted: Column, limit: Column): Column {
  return submitted.map((s, i) => {
    const l = limit[i]
    if (!isValid(s) && !isValid(l)) return null
    return isValid(s) && isValid(l) && l > 0 ? s / l : 0
  })
}

/**
 * Row-wise sum of the valid parts; null when every part is missing
 */
export function sumColumns(parts: readonly Column[], length: number): Column {
  return Array.from({ length }, (_, i) => {
    const values = parts.map((part) => part[i]).filter(isValid)
    return values.length > 0 ? values.reduce((a, b) => a + b, 0) : null
  })
}

/**
 * (value - mean) / sample std over the whole column; all null when the
 * column does not vary
 */
export function fullSampleZScore(values: Column): Column {
  const valid = validValues(values)
  const m = mean(valid)
  const s = sampleStd(valid)
  if (m === null || s === null || s <= 0) return nullColumn(values.length)
  return mapColumn(values, (v) => (v - m) / s)
}

export function derivePlumbingMetrics(
  table: AlignedTable,
  config: PlumbingConfig = DEFAULT_CONFIG.plumbing
): Pick<DerivationReport, 'applied' | 'omitted'> {
  const report: Pick<DerivationReport, 'applied' | 'omitted'> = { applied: [], omitted: [] }

  applyTransform(
    table,
    defineTransform({
      id: 'repo_submission_ratio',
      required: ['repo_submitted', 'repo_operation_limit'],
      outputs: { repo_submission_ratio: 'ratio' },
      compute: (input) => ({
        repo_submission_ratio: submissionRatio(input.required('repo_submitted'), input.required('repo_operation_limit')),
      }),
    }),
    report
  )

  // A supplied total wins over the per-category parts
  if (!isPresent(table, 'settlement_fails')) {
    const parts = config.failsColumns.filter((name) => isPresent(table, name))
    if (parts.length === 0) {
      report.omitted.push({ id: 'settlement_fails', missing: [...config.failsColumns] })
    } else {
      const units: Units = table.units[parts[0]] ?? 'millions'
      applyTransform(
        table,
        defineTransform({
          id: 'settlement_fails',
          required: parts,
          outputs: { settlement_fails: units },
          compute: (input, t) => ({
            settlement_fails: sumColumns(
              parts.map((name) => input.required(name)),
              t.dates.length
            ),
          }),
        }),
        report
      )
    }
  }

  const failsUnits: Units = table.units.settlement_fails ?? 'millions'
  applyTransform(
    table,
    defineTransform({
      id: 'settlement_fails_statistics',
      required: ['settlement_fails'],
      outputs: {
        ma5_settlement_fails: failsUnits,
        ma20_settlement_fails: failsUnits,
        settlement_fails_zscore: 'index',
      },
      compute: (input) => {
        const fails = input.required('settlement_fails')
        return {
          ma5_settlement_fails: rollingMean(fails, FAILS_MA_SHORT),
          ma20_settlement_fails: rollingMean(fails, FAILS_MA_LONG),
          settlement_fails_zscore: fullSampleZScore(fails),
        }
      },
    }),
    report
  )

  if (report.applied.length > 0) {
    console.log(`[plumbing] derived ${report.applied.join(', ')}`)
  }

  return report
}
