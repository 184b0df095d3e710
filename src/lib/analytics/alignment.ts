/**
 * Series Alignment
 *
 * Merges heterogeneous-frequency series onto one date axis. Gaps stay null;
 * only the frequency-specific fill rules below ever carry a value forward.
 */

import { DEFAULT_CONFIG, type AlignmentConfig } from '@/lib/config'
import { datePart, daysBetween } from './dates'
import { forwardFill, isValid } from './rolling'
import { getSeriesByColumn } from './series-registry'
import { nullColumn, setColumn } from './table'
import type { AlignedTable, AlignmentResult, Column, RawSeries, SeriesFrequency, SeriesMap, TimePoint } from './types'

export type AlignOptions = Partial<AlignmentConfig>

// ============================================================================
// Observation Indexing
// ============================================================================

/**
 * date -> value, first observation wins, non-finite values dropped
 */
function indexObservations(observations: readonly TimePoint[]): Map<string, number> {
  const byDate = new Map<string, number>()
  for (const { date, value } of observations) {
    if (byDate.has(date) || !isValid(value)) continue
    byDate.set(date, value)
  }
  return byDate
}

function lastObservedDate(series: RawSeries): string | null {
  if (series.lastUpdated) return datePart(series.lastUpdated)
  let last: string | null = null
  for (const { date, value } of series.observations) {
    if (isValid(value) && (last === null || date > last)) last = date
  }
  return last
}

// ============================================================================
// Fill Rules
// ============================================================================

/**
 * Forward-fill a daily series, carrying a value at most `limitDays` calendar
 * days past the observation it came from.
 */
export function forwardFillCalendarDays(dates: readonly string[], values: Column, limitDays: number): Column {
  const result: Column = []
  let last: { date: string; value: number } | null = null

  for (let i = 0; i < values.length; i++) {
    const v = values[i]
    const date = dates[i]
    if (isValid(v)) {
      last = { date, value: v }
      result.push(v)
    } else if (last !== null && daysBetween(last.date, date) <= limitDays) {
      result.push(last.value)
    } else {
      result.push(null)
    }
  }

  return result
}

function applyFrequencyFill(
  dates: readonly string[],
  values: Column,
  frequency: SeriesFrequency,
  dailyFillLimitDays: number
): Column {
  switch (frequency) {
    case 'weekly':
    case 'policy-driven':
      return forwardFill(values)
    case 'daily':
      return forwardFillCalendarDays(dates, values, dailyFillLimitDays)
    case 'unknown':
      return values
  }
}

// ============================================================================
// Alignment
// ============================================================================

/**
 * Align every series onto the union of their observed dates.
 *
 * Supplements (`target -> source`) only fill dates where the target has no
 * observation; the target's own fill rule runs afterwards. The start date
 * filter runs after filling so earlier observations can carry into it.
 */
export function alignSeries(series: SeriesMap, options: AlignOptions = {}): AlignmentResult {
  const { startDate, dailyFillLimitDays, requiredColumns, supplements } = { ...DEFAULT_CONFIG.alignment, ...options }

  const supplementSources = new Set(Object.values(supplements))
  const indexed = new Map<string, Map<string, number>>()
  const allDates = new Set<string>()
  const lastObservations: Record<string, string> = {}

  for (const [id, raw] of Object.entries(series)) {
    const byDate = indexObservations(raw.observations)
    indexed.set(id, byDate)
    for (const { date } of raw.observations) allDates.add(date)
    const last = lastObservedDate(raw)
    if (last !== null) lastObservations[id] = last
  }

  const dates = [...allDates].sort()
  const columns: Record<string, Column> = {}
  const units: AlignedTable['units'] = {}

  const targets = new Set(Object.keys(series).filter((id) => !supplementSources.has(id)))
  for (const target of Object.keys(supplements)) {
    if (series[supplements[target]] !== undefined) targets.add(target)
  }

  for (const id of targets) {
    const primary = series[id]
    const sourceId = supplements[id]
    const supplement = sourceId !== undefined ? series[sourceId] : undefined
    const meta = primary ?? supplement
    if (meta === undefined) continue

    const own = indexed.get(id)
    const extra = sourceId !== undefined ? indexed.get(sourceId) : undefined

    let filledFromSupplement = 0
    const values: Column = dates.map((date) => {
      const value = own?.get(date)
      if (value !== undefined) return value
      const fallback = extra?.get(date)
      if (fallback === undefined) return null
      filledFromSupplement++
      return fallback
    })

    if (primary !== undefined && filledFromSupplement > 0) {
      console.log(`[aligner] ${id}: ${filledFromSupplement} dates filled from ${sourceId}`)
    }

    columns[id] = applyFrequencyFill(dates, values, meta.frequency, dailyFillLimitDays)
    units[id] = meta.units
  }

  const keep = startDate ? dates.map((date) => date >= startDate) : dates.map(() => true)
  const table: AlignedTable = {
    dates: dates.filter((_, i) => keep[i]),
    columns: Object.fromEntries(Object.entries(columns).map(([id, values]) => [id, values.filter((_, i) => keep[i])])),
    units,
  }

  const placeholders: string[] = []
  for (const id of requiredColumns) {
    if (Object.hasOwn(table.columns, id)) continue
    console.warn(`[aligner] required series ${id} missing, using empty placeholder`)
    // Registry units where the column is known; 'index' is never rescaled
    setColumn(table, id, nullColumn(table.dates.length), getSeriesByColumn(id)?.units ?? 'index')
    placeholders.push(id)
  }

  return { table, lastObservations, placeholders }
}

// ============================================================================
// Long-to-Wide Reshape
// ============================================================================

export interface PivotKeys {
  dateKey: string
  seriesKey: string
  valueKey: string
}

/**
 * Reshape list-of-record sources (one row per date and series) into one
 * ascending observation list per series. Records with an unusable date, key
 * or value are skipped; for duplicate date+series pairs the first record wins.
 */
export function pivotLongRecords(
  records: readonly Record<string, unknown>[],
  { dateKey, seriesKey, valueKey }: PivotKeys
): Record<string, TimePoint[]> {
  const grouped = new Map<string, Map<string, number>>()

  for (const record of records) {
    const date = record[dateKey]
    const key = record[seriesKey]
    const value = toNumber(record[valueKey])
    if (typeof date !== 'string' || typeof key !== 'string' || value === null) continue

    let byDate = grouped.get(key)
    if (byDate === undefined) {
      byDate = new Map()
      grouped.set(key, byDate)
    }
    const day = datePart(date)
    if (!byDate.has(day)) byDate.set(day, value)
  }

  const result: Record<string, TimePoint[]> = {}
  for (const [key, byDate] of grouped) {
    result[key] = [...byDate.entries()]
      .map(([date, value]) => ({ date, value }))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
  }
  return result
}

function toNumber(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}
