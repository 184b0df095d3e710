/**
 * Period Aggregation (month-to-date, quarter-to-date, rolling 3 months)
 *
 * Windows are always recomputed from the table's last date. Changes are
 * measured between the first and last valid observation inside a window, so
 * a window that opens on a holiday still has a baseline.
 */

import { DEFAULT_CONFIG, type TemporalConfig } from '@/lib/config'
import { monthStart, quarterStart } from '@/lib/analytics/dates'
import { firstValidIndex, isValid, lastValidIndex, mean, sampleStd } from '@/lib/analytics/rolling'
import { getColumn } from '@/lib/analytics/table'
import type {
  AlignedTable,
  Column,
  MonthToDateSummary,
  PeriodKind,
  PeriodSummary,
  PeriodWindow,
  QuarterToDateSummary,
  RollingSummary,
  TemporalSummary,
  ValidObservation,
} from '@/lib/analytics/types'
import { linearFit, trendLabel } from './forecast'

export type WindowOptions = Pick<TemporalConfig, 'fiscalYearStartMonth' | 'rollingSessions'>

// ============================================================================
// Windows
// ============================================================================

export function periodWindow(
  dates: readonly string[],
  kind: PeriodKind,
  options: WindowOptions = DEFAULT_CONFIG.temporal
): PeriodWindow | null {
  if (dates.length === 0) return null
  const end = dates[dates.length - 1]

  if (kind === 'rolling') {
    const startIndex = Math.max(0, dates.length - options.rollingSessions)
    return { kind, start: dates[startIndex], end, sessions: dates.length - startIndex }
  }

  const start = kind === 'month' ? monthStart(end) : quarterStart(end, options.fiscalYearStartMonth)
  const startIndex = dates.findIndex((date) => date >= start)
  return { kind, start, end, sessions: dates.length - startIndex }
}

function windowStartIndex(dates: readonly string[], window: PeriodWindow): number {
  return dates.length - window.sessions
}

function observationsIn(dates: readonly string[], values: Column, window: PeriodWindow): ValidObservation[] {
  const observations: ValidObservation[] = []
  for (let i = windowStartIndex(dates, window); i < dates.length; i++) {
    const v = values[i]
    if (isValid(v)) observations.push({ date: dates[i], value: v })
  }
  return observations
}

/**
 * Last valid minus first valid observation inside the window; null with
 * fewer than two valid observations.
 */
export function changeWithinPeriod(dates: readonly string[], values: Column, window: PeriodWindow): number | null {
  const from = windowStartIndex(dates, window)
  const first = firstValidIndex(values, from, dates.length - 1)
  const last = lastValidIndex(values, from, dates.length - 1)
  if (first === null || last === null || first === last) return null

  const a = values[first]
  const b = values[last]
  return isValid(a) && isValid(b) ? b - a : null
}

// ============================================================================
// Percentages & Ranks
// ============================================================================

/**
 * change / baseline × 100, suppressed to 0 when the baseline is not positive
 * or the result exceeds ±bound
 */
export function boundedPercentChange(change: number, baseline: number, bound: number = DEFAULT_CONFIG.temporal.percentBound): number {
  if (!Number.isFinite(change) || !Number.isFinite(baseline) || baseline <= 0) return 0
  const pct = (change / baseline) * 100
  if (!Number.isFinite(pct) || Math.abs(pct) > bound) return 0
  return pct
}

export function percentChangeFromCurrent(current: number, change: number, bound?: number): number {
  return boundedPercentChange(change, current - change, bound)
}

/**
 * Share of valid values in the trailing window strictly below the current
 * value, ×100
 */
export function trailingPercentileRank(values: Column, window: number = DEFAULT_CONFIG.temporal.percentileWindow): number | null {
  if (values.length < window) return null
  const current = values[values.length - 1]
  if (!isValid(current)) return null

  const trailing = values.slice(-window).filter(isValid)
  const below = trailing.filter((v) => v < current).length
  return (below / trailing.length) * 100
}

// ============================================================================
// Summaries
// ============================================================================

function summarizePeriod(dates: readonly string[], values: Column, window: PeriodWindow, bound: number): PeriodSummary {
  const observations = observationsIn(dates, values, window)
  const valid = observations.map((o) => o.value)
  const firstValid = observations[0] ?? null
  const lastValid = observations[observations.length - 1] ?? null
  const change = changeWithinPeriod(dates, values, window)

  return {
    window,
    firstValid,
    lastValid,
    change,
    changePct: change !== null && lastValid !== null ? percentChangeFromCurrent(lastValid.value, change, bound) : null,
    average: mean(valid),
    min: valid.length > 0 ? Math.min(...valid) : null,
    max: valid.length > 0 ? Math.max(...valid) : null,
    std: sampleStd(valid),
  }
}

function summarizeMonth(table: AlignedTable, column: string, values: Column, config: TemporalConfig): MonthToDateSummary | null {
  const window = periodWindow(table.dates, 'month', config)
  if (window === null) return null

  const changes = getColumn(table, `${column}_change`)
  const flows = changes ? observationsIn(table.dates, changes, window).map((o) => o.value) : []

  return {
    ...summarizePeriod(table.dates, values, window, config.percentBound),
    flow: flows.length > 0 ? flows.reduce((a, b) => a + b, 0) : null,
  }
}

function summarizeQuarter(table: AlignedTable, values: Column, config: TemporalConfig): QuarterToDateSummary | null {
  const window = periodWindow(table.dates, 'quarter', config)
  if (window === null) return null

  const summary = summarizePeriod(table.dates, values, window, config.percentBound)
  return {
    ...summary,
    annualizedPace: summary.change !== null && window.sessions > 0 ? (summary.change / window.sessions) * config.annualizationFactor : null,
  }
}

function summarizeRolling(table: AlignedTable, values: Column, config: TemporalConfig): RollingSummary | null {
  const window = periodWindow(table.dates, 'rolling', config)
  if (window === null) return null

  const summary = summarizePeriod(table.dates, values, window, config.percentBound)
  const points = values.slice(windowStartIndex(table.dates, window)).filter(isValid)
  const fit = linearFit(
    points.map((_, i) => i),
    points
  )

  return {
    ...summary,
    percentile: trailingPercentileRank(values, config.percentileWindow),
    trend: fit ? trendLabel(fit.slope, config.trendSlopeThreshold) : null,
  }
}

export function summarizeTemporal(
  table: AlignedTable,
  column: string,
  config: TemporalConfig = DEFAULT_CONFIG.temporal
): TemporalSummary {
  const values = getColumn(table, column)
  if (values === undefined) return { column, mtd: null, qtd: null, rolling3m: null }

  return {
    column,
    mtd: summarizeMonth(table, column, values, config),
    qtd: summarizeQuarter(table, values, config),
    rolling3m: summarizeRolling(table, values, config),
  }
}
