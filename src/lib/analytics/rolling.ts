/**
 * Gap-aware series math.
 *
 * Every helper takes a Column ((number | null)[]) and returns a new one of the
 * same length. A null never counts as an observation; rolling windows are
 * evaluated once `minPeriods` valid values exist inside the window, so partial
 * windows at the start of the series still produce output.
 */

import type { Column } from './types'

// ============================================================================
// Plain Statistics
// ============================================================================

export function isValid(v: number | null | undefined): v is number {
  return v !== null && v !== undefined && Number.isFinite(v)
}

export function validValues(values: readonly (number | null)[]): number[] {
  return values.filter(isValid)
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null
  return values.reduce((a, b) => a + b, 0) / values.length
}

/**
 * Sample standard deviation (n - 1 denominator)
 */
export function sampleStd(values: readonly number[]): number | null {
  if (values.length < 2) return null
  const m = values.reduce((a, b) => a + b, 0) / values.length
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1)
  return Math.sqrt(variance)
}

/**
 * Quantile with linear interpolation between closest ranks
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const pos = (sorted.length - 1) * q
  const lower = Math.floor(pos)
  const upper = Math.ceil(pos)
  const lo = sorted[lower]
  const hi = sorted[upper]
  if (lo === undefined || hi === undefined) return null
  return lo + (hi - lo) * (pos - lower)
}

// ============================================================================
// Shifts & Differences
// ============================================================================

/**
 * Carry the last valid value forward. With `limit`, at most that many
 * consecutive gaps are filled after each valid value.
 */
export function forwardFill(values: Column, limit: number = Infinity): Column {
  const result: Column = []
  let last: number | null = null
  let run = 0

  for (const v of values) {
    if (isValid(v)) {
      last = v
      run = 0
      result.push(v)
      continue
    }
    run++
    result.push(last !== null && run <= limit ? last : null)
  }

  return result
}

/**
 * value[i] shifted down by n rows (value[i - n])
 */
export function shift(values: Column, n: number): Column {
  return values.map((_, i) => {
    const prev = values[i - n]
    return i >= n && isValid(prev) ? prev : null
  })
}

/**
 * value[i] - value[i - n]; null when either side is missing
 */
export function diff(values: Column, n: number = 1): Column {
  return values.map((current, i) => {
    if (i < n) return null
    const previous = values[i - n]
    if (!isValid(current) || !isValid(previous)) return null
    return current - previous
  })
}

// ============================================================================
// Rolling Windows
// ============================================================================

function rollingApply(
  values: Column,
  window: number,
  minPeriods: number,
  fn: (windowValues: number[]) => number | null
): Column {
  const result: Column = []

  for (let i = 0; i < values.length; i++) {
    const windowValues: number[] = []
    for (let j = Math.max(0, i - window + 1); j <= i; j++) {
      const v = values[j]
      if (isValid(v)) windowValues.push(v)
    }
    result.push(windowValues.length >= minPeriods ? fn(windowValues) : null)
  }

  return result
}

export function rollingMean(values: Column, window: number, minPeriods: number = window): Column {
  return rollingApply(values, window, minPeriods, mean)
}

export function rollingStd(values: Column, window: number, minPeriods: number = window): Column {
  return rollingApply(values, window, Math.max(2, minPeriods), sampleStd)
}

export function rollingSum(values: Column, window: number, minPeriods: number = window): Column {
  return rollingApply(values, window, minPeriods, (w) => w.reduce((a, b) => a + b, 0))
}

export function rollingQuantile(values: Column, window: number, q: number, minPeriods: number = window): Column {
  return rollingApply(values, window, minPeriods, (w) => quantile(w, q))
}

// ============================================================================
// Valid-Observation Lookup
// ============================================================================

export function firstValidIndex(values: Column, from: number = 0, to: number = values.length - 1): number | null {
  for (let i = from; i <= to; i++) {
    if (isValid(values[i])) return i
  }
  return null
}

export function lastValidIndex(values: Column, from: number = 0, to: number = values.length - 1): number | null {
  for (let i = to; i >= from; i--) {
    if (isValid(values[i])) return i
  }
  return null
}
