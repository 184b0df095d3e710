/**
 * Liquidity Analytics Engine - Type Definitions
 *
 * Shared shapes for raw inputs, the aligned table and every derived record.
 * Nothing here performs I/O; callers supply already-parsed series.
 */

// ============================================================================
// Raw Inputs
// ============================================================================

export type SeriesFrequency = 'daily' | 'weekly' | 'policy-driven' | 'unknown'

export type MonetaryUnit = 'millions' | 'billions' | 'trillions'
export type Units = MonetaryUnit | 'percent' | 'basis-points' | 'index' | 'ratio'

export interface TimePoint {
  date: string // ISO date string YYYY-MM-DD
  value: number
}

export interface RawSeries {
  id: string
  units: Units
  frequency: SeriesFrequency
  observations: readonly TimePoint[]
  /** Publication timestamp reported by the source, when it has one */
  lastUpdated?: string
}

export type SeriesMap = Record<string, RawSeries>

// ============================================================================
// Aligned Table
// ============================================================================

/** One value per table date; null marks a gap */
export type Column = (number | null)[]

export interface AlignedTable {
  /** Ascending, unique ISO dates */
  dates: string[]
  columns: Record<string, Column>
  units: Record<string, Units>
}

export interface AlignmentResult {
  table: AlignedTable
  /** Last observation (or source update) date per input series */
  lastObservations: Record<string, string>
  placeholders: string[]
}

// ============================================================================
// Derivation
// ============================================================================

export type NetLiquidityVariant = 'full' | 'ex-tga' | 'unavailable'

export interface OmittedMetric {
  id: string
  missing: string[]
}

export interface DerivationReport {
  applied: string[]
  omitted: OmittedMetric[]
  netLiquidityVariant: NetLiquidityVariant
  /** Column holding net liquidity for this run, null when unavailable */
  netLiquidityColumn: string | null
}

// ============================================================================
// Temporal Aggregates
// ============================================================================

export type PeriodKind = 'month' | 'quarter' | 'rolling'

export interface PeriodWindow {
  kind: PeriodKind
  start: string
  end: string
  /** Number of table rows inside the window */
  sessions: number
}

export interface ValidObservation {
  date: string
  value: number
}

export interface PeriodSummary {
  window: PeriodWindow
  firstValid: ValidObservation | null
  lastValid: ValidObservation | null
  change: number | null
  changePct: number | null
  average: number | null
  min: number | null
  max: number | null
  std: number | null
}

export type TrendLabel = 'Rising' | 'Declining' | 'Flat'

export interface MonthToDateSummary extends PeriodSummary {
  /** Sum of the column's daily changes inside the month */
  flow: number | null
}

export interface QuarterToDateSummary extends PeriodSummary {
  /** change / sessions * 252 */
  annualizedPace: number | null
}

export interface RollingSummary extends PeriodSummary {
  percentile: number | null
  trend: TrendLabel | null
}

export interface TemporalSummary {
  column: string
  mtd: MonthToDateSummary | null
  qtd: QuarterToDateSummary | null
  rolling3m: RollingSummary | null
}

// ============================================================================
// Spikes
// ============================================================================

export type SpikeSeverity = 'NORMAL' | 'ELEVATED' | 'WARNING' | 'CRITICAL'

export interface SpikeAnalysis {
  column: string
  date: string
  current: number
  isSpike: boolean
  methods: {
    threshold: boolean
    absolute: boolean
    percentile: boolean
  }
  severity: SpikeSeverity
  ma20: number | null
  std20: number | null
  thresholdUpper: number | null
  percentile95: number | null
  mtdSpikeCount: number
  qtdSpikeCount: number
  max3m: ValidObservation
}

// ============================================================================
// Stress
// ============================================================================

export type StressComponentId = 'sofr_spread' | 'effr_spread' | 'volatility' | 'rrp_usage' | 'repo_usage'

export type StressLevel = 'LOW' | 'MODERATE' | 'ELEVATED' | 'HIGH STRESS'

export interface StressComponent {
  id: StressComponentId
  label: string
  /** Always within [0, 100]; 0 when the input is missing */
  value: number
  weight: number
  available: boolean
}

export interface StressIndex {
  /** null only when no component could be computed */
  score: number | null
  level: StressLevel | null
  components: StressComponent[]
  componentsAvailable: number
}

// ============================================================================
// Regime
// ============================================================================

export type RegimeSignal = 'QT' | 'QE' | 'NEUTRAL' | 'TIGHTENING' | 'EASING'
export type MonetaryRegime = 'QT' | 'QE' | 'NEUTRAL' | 'UNKNOWN'

export interface RegimeClassification {
  regime: MonetaryRegime
  /** 0-100 */
  confidence: number
  signals: RegimeSignal[]
}

// ============================================================================
// Composite Index
// ============================================================================

export type CompositeBand = 'Very Tight' | 'Tight' | 'Neutral' | 'Easy' | 'Very Easy'

export interface CompositeIndexRecord {
  date: string
  subIndices: Record<string, number | null>
  composite: number
  compositeFast: number | null
  compositeSlow: number | null
  band: CompositeBand
}

// ============================================================================
// Forecast
// ============================================================================

export interface TrendForecast {
  column: string
  slope: number
  intercept: number
  current: number
  horizon: number
  forecast: number
  /** Fitted values for each step 1..horizon after the last valid point */
  path: number[]
  trend: TrendLabel
  rSquared: number
  points: number
}

// ============================================================================
// Alerts & Data Quality
// ============================================================================

export type AlertSeverity = 'CRITICAL' | 'WARNING' | 'INFO'
export type AlertType = 'STRESS' | 'SPREAD_SPIKE' | 'RRP_FLOW' | 'QT_PACE' | 'LIQUIDITY' | 'SWAP_LINES'

export interface Alert {
  severity: AlertSeverity
  type: AlertType
  message: string
}

export type FreshnessStatus = 'OK' | 'DELAYED' | 'STALE'

export interface SeriesFreshness {
  seriesId: string
  lastDate: string
  daysOld: number
  frequency: SeriesFrequency
  status: FreshnessStatus
}

export interface FreshnessReport {
  series: SeriesFreshness[]
  warnings: string[]
}

export interface FourWeekReconciliation {
  sliding: number | null
  block: number | null
  discrepancy: number | null
  discrepancyPct: number | null
  withinTolerance: boolean
}

// ============================================================================
// Run Summary
// ============================================================================

export interface AnalysisSummary {
  asOf: string
  netLiquidityVariant: NetLiquidityVariant
  temporal: TemporalSummary[]
  spikes: SpikeAnalysis | null
  stress: StressIndex
  regime: RegimeClassification
  correlations: Record<string, number | null>
  forecasts: TrendForecast[]
  alerts: Alert[]
  freshness: FreshnessReport
  fiscal: FourWeekReconciliation | null
}

export interface AnalysisResult {
  table: AlignedTable
  derivation: DerivationReport
  summary: AnalysisSummary
  composite: CompositeIndexRecord[]
}
