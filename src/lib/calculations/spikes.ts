/**
 * Spread Spike Detection
 *
 * Three independent tests on the non-missing observations of a spread held
 * in basis points; any one of them flags a spike. Severity is graded
 * separately from the flag, by distance from the 20-session mean.
 */

import { DEFAULT_CONFIG, type SpikeConfig } from '@/lib/config'
import { monthStart, quarterStart } from '@/lib/analytics/dates'
import { isValid, rollingMean, rollingQuantile, rollingStd } from '@/lib/analytics/rolling'
import type { Column, SpikeAnalysis, SpikeSeverity, ValidObservation } from '@/lib/analytics/types'

export function spikeSeverity(value: number, ma: number | null, std: number | null): SpikeSeverity {
  if (ma === null || std === null) return 'NORMAL'
  if (value > ma + 3 * std) return 'CRITICAL'
  if (value > ma + 2 * std) return 'WARNING'
  if (value > ma + std) return 'ELEVATED'
  return 'NORMAL'
}

function maxObservation(observations: readonly ValidObservation[]): ValidObservation {
  return observations.reduce((best, o) => (o.value > best.value ? o : best))
}

export interface SpikeOptions {
  column?: string
  /** Aligns the QTD count with the temporal quarter windows */
  fiscalYearStartMonth?: number
}

export function detectSpreadSpikes(
  dates: readonly string[],
  values: Column,
  config: SpikeConfig = DEFAULT_CONFIG.spikes,
  { column = config.column, fiscalYearStartMonth = DEFAULT_CONFIG.temporal.fiscalYearStartMonth }: SpikeOptions = {}
): SpikeAnalysis | null {
  const observations: ValidObservation[] = []
  values.forEach((v, i) => {
    if (isValid(v)) observations.push({ date: dates[i], value: v })
  })
  if (observations.length < config.minObservations) return null

  const series: Column = observations.map((o) => o.value)
  const ma = rollingMean(series, config.maWindow, config.maMinPeriods)
  const std = rollingStd(series, config.maWindow, config.maMinPeriods)
  const hasPercentile = observations.length >= config.percentileWindow
  const p95 = hasPercentile
    ? rollingQuantile(series, config.percentileWindow, config.percentile, config.percentileMinPeriods)
    : series.map(() => null)

  const flags = observations.map(({ value }, i) => {
    const m = ma[i]
    const s = std[i]
    const q = p95[i]
    const threshold = isValid(m) && isValid(s) && value > m + config.thresholdStd * s
    const absolute = value > config.absoluteBps
    const percentile = isValid(q) && value > q
    return { threshold, absolute, percentile, any: threshold || absolute || percentile }
  })

  const last = observations.length - 1
  const current = observations[last]
  const currentFlags = flags[last]
  const currentMa = ma[last]
  const currentStd = std[last]
  const currentP95 = p95[last]

  const monthBoundary = monthStart(current.date)
  const quarterBoundary = quarterStart(current.date, fiscalYearStartMonth)
  const countSince = (boundary: string) =>
    flags.filter((flag, i) => flag.any && observations[i].date >= boundary).length

  return {
    column,
    date: current.date,
    current: current.value,
    isSpike: currentFlags.any,
    methods: {
      threshold: currentFlags.threshold,
      absolute: currentFlags.absolute,
      percentile: currentFlags.percentile,
    },
    severity: spikeSeverity(current.value, currentMa, currentStd),
    ma20: currentMa,
    std20: currentStd,
    thresholdUpper: isValid(currentMa) && isValid(currentStd) ? currentMa + config.thresholdStd * currentStd : null,
    percentile95: currentP95,
    mtdSpikeCount: countSince(monthBoundary),
    qtdSpikeCount: countSince(quarterBoundary),
    max3m: maxObservation(observations.slice(-config.rollingSessions)),
  }
}
