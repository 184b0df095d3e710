/**
 * Liquidity Analysis Run
 *
 * Chains alignment, derivation and every aggregate into one summary record.
 * Pure and synchronous: fetching the series and persisting the result belong
 * to the caller.
 */

import { DEFAULT_CONFIG, type EngineConfig } from '@/lib/config'
import { deriveMetrics } from '@/lib/calculations/liquidity'
import { deriveFiscalMetrics, reconcileFourWeekImpulse } from '@/lib/calculations/fiscal'
import { derivePlumbingMetrics } from '@/lib/calculations/plumbing'
import { summarizeTemporal } from '@/lib/calculations/temporal'
import { detectSpreadSpikes } from '@/lib/calculations/spikes'
import { computeStressIndex, latestStressInputs } from '@/lib/calculations/stress-index'
import { classifyRegime } from '@/lib/calculations/regime'
import { buildCompositeIndex } from '@/lib/calculations/composite-index'
import { forecastTrend } from '@/lib/calculations/forecast'
import { checkAlerts } from '@/lib/calculations/alerts'
import { checkDataFreshness } from '@/lib/utils/data-validation'
import { alignSeries } from './alignment'
import { computeLiquidityCorrelations } from './correlations'
import { toIsoDate } from './dates'
import { getColumn, isPresent, lastValue } from './table'
import type { AnalysisResult, SeriesFrequency, SeriesMap, TemporalSummary, TrendForecast } from './types'

export interface AnalysisOptions {
  config?: EngineConfig
  /** Date freshness is measured against; defaults to today */
  reportDate?: string
}

export function runLiquidityAnalysis(series: SeriesMap, options: AnalysisOptions = {}): AnalysisResult {
  const startTime = Date.now()
  const config = options.config ?? DEFAULT_CONFIG
  const reportDate = options.reportDate ?? toIsoDate(new Date())

  // 1. Align & derive
  const { table, lastObservations, placeholders } = alignSeries(series, config.alignment)
  const derivation = deriveMetrics(table, config)

  const fiscalReport = deriveFiscalMetrics(table, config.fiscal, config.baseUnit)
  derivation.applied.push(...fiscalReport.applied)
  const plumbingReport = derivePlumbingMetrics(table, config.plumbing)
  derivation.applied.push(...plumbingReport.applied)

  const netLiquidity = derivation.netLiquidityColumn
  const asOf = table.dates[table.dates.length - 1] ?? reportDate

  // 2. Period aggregates
  const summaryColumns = new Set(config.temporal.columns.filter((name) => isPresent(table, name)))
  const temporal = [...summaryColumns].map((name) => summarizeTemporal(table, name, config.temporal))
  const temporalFor = (name: string | null): TemporalSummary | null => {
    if (name === null || !isPresent(table, name)) return null
    return temporal.find((t) => t.column === name) ?? summarizeTemporal(table, name, config.temporal)
  }

  // 3. Spikes, stress, regime
  const spreadColumn = getColumn(table, config.spikes.column)
  const spikes = spreadColumn
    ? detectSpreadSpikes(table.dates, spreadColumn, config.spikes, {
        fiscalYearStartMonth: config.temporal.fiscalYearStartMonth,
      })
    : null
  const stress = computeStressIndex(latestStressInputs(table, config.metrics), config.stress)
  const regime = classifyRegime(table, config.regime)

  // 4. Correlations & forecasts
  const correlations = computeLiquidityCorrelations(table, config.correlations)
  const forecasts: TrendForecast[] = []
  for (const name of config.forecast.columns) {
    const values = getColumn(table, name)
    const forecast = values ? forecastTrend(name, values, config.forecast) : null
    if (forecast) forecasts.push(forecast)
  }

  // 5. Alerts & data quality
  const swapLinesColumn = getColumn(table, 'swap_lines')
  const alerts = checkAlerts(
    {
      stress,
      spikes,
      rrp: temporalFor('rrp_balance'),
      assets: temporalFor('fed_total_assets'),
      netLiquidity: temporalFor(netLiquidity),
      swapLines: swapLinesColumn ? lastValue(swapLinesColumn) : null,
    },
    config.alerts
  )

  const frequencies: Record<string, SeriesFrequency> = {}
  for (const [id, raw] of Object.entries(series)) frequencies[id] = raw.frequency
  const freshness = checkDataFreshness(lastObservations, frequencies, reportDate, config.freshness)
  for (const id of placeholders) freshness.warnings.push(`${id}: no observations supplied`)

  const fiscal = isPresent(table, 'net_impulse') ? reconcileFourWeekImpulse(table, config.fiscal) : null
  const composite = buildCompositeIndex(table, config.composite)

  console.log(
    `[analysis] ${table.dates.length} sessions through ${asOf} analysed in ${Date.now() - startTime}ms ` +
      `(net liquidity: ${derivation.netLiquidityVariant}, regime: ${regime.regime}, alerts: ${alerts.length})`
  )

  return {
    table,
    derivation,
    summary: {
      asOf,
      netLiquidityVariant: derivation.netLiquidityVariant,
      temporal,
      spikes,
      stress,
      regime,
      correlations,
      forecasts,
      alerts,
      freshness,
      fiscal,
    },
    composite,
  }
}
