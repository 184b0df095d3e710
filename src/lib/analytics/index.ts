/**
 * Liquidity Analytics Engine
 *
 * Pure, synchronous analytics over central-bank balance sheet, money-market
 * and fiscal series. Fetching and persistence live in api-clients/ and cache/.
 */

// Types
export type {
  SeriesFrequency,
  MonetaryUnit,
  Units,
  TimePoint,
  RawSeries,
  SeriesMap,
  Column,
  AlignedTable,
  AlignmentResult,
  NetLiquidityVariant,
  DerivationReport,
  PeriodKind,
  PeriodWindow,
  PeriodSummary,
  TemporalSummary,
  SpikeSeverity,
  SpikeAnalysis,
  StressComponent,
  StressIndex,
  StressLevel,
  RegimeSignal,
  MonetaryRegime,
  RegimeClassification,
  CompositeBand,
  CompositeIndexRecord,
  TrendForecast,
  Alert,
  FreshnessReport,
  FourWeekReconciliation,
  AnalysisSummary,
  AnalysisResult,
} from './types'

// Series Registry
export { SERIES_REGISTRY, getSeriesMetadata, getRegisteredSeriesIds, getSeriesByColumn } from './series-registry'

// Alignment & Table Access
export { alignSeries, pivotLongRecords, forwardFillCalendarDays, type AlignOptions } from './alignment'
export { defineTransform, applyTransform, getColumn, isPresent, type Transform } from './table'

// Correlations
export { pearsonCorrelation, computeLiquidityCorrelations } from './correlations'

// Orchestration
export { runLiquidityAnalysis, type AnalysisOptions } from './compute-analysis'

// Calculators
export { deriveMetrics, normalizeUnits } from '@/lib/calculations/liquidity'
export { deriveFiscalMetrics, fourWeekBlockImpulse, reconcileFourWeekImpulse } from '@/lib/calculations/fiscal'
export { derivePlumbingMetrics } from '@/lib/calculations/plumbing'
export {
  periodWindow,
  changeWithinPeriod,
  boundedPercentChange,
  percentChangeFromCurrent,
  trailingPercentileRank,
  summarizeTemporal,
} from '@/lib/calculations/temporal'
export { detectSpreadSpikes, type SpikeOptions } from '@/lib/calculations/spikes'
export { computeStressIndex, latestStressInputs, type StressInputs } from '@/lib/calculations/stress-index'
export { classifyRegime } from '@/lib/calculations/regime'
export { zScoreNormalize, buildSubIndex, buildCompositeIndex } from '@/lib/calculations/composite-index'
export { forecastTrend, linearFit } from '@/lib/calculations/forecast'
export { checkAlerts, type AlertInputs } from '@/lib/calculations/alerts'
export { checkDataFreshness, checkHouseholdShareBounds, reconcileNetLiquidity } from '@/lib/utils/data-validation'
