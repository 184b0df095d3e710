import { z } from 'zod'
import { ConfigError } from './utils/errors'

export const CONFIG = {
  api: {
    fred: {
      baseUrl: 'https://api.stlouisfed.org/fred',
    },
  },
  cache: {
    namespace: 'liquidity',
  },
} as const

// ============================================================================
// Engine Configuration Schema
// ============================================================================

const WEIGHT_TOLERANCE = 1e-6

const spreadPairSchema = z.object({
  id: z.string().min(1),
  minuend: z.string().min(1),
  subtrahend: z.string().min(1),
  /** 100 turns a percent difference into basis points */
  scale: z.number().positive(),
})

const compositeComponentSchema = z.object({
  /** First column present in the table is used */
  columns: z.array(z.string().min(1)).min(1),
  transform: z.enum(['level', 'diff']),
  sign: z.union([z.literal(1), z.literal(-1)]),
  weight: z.number().nonnegative(),
})

const correlationPairSchema = z.object({
  id: z.string().min(1),
  a: z.array(z.string().min(1)).min(1),
  b: z.array(z.string().min(1)).min(1),
})

const freshnessRuleSchema = z.object({
  expectedLagDays: z.number().int().nonnegative(),
  staleAfterDays: z.number().int().positive(),
})

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

export const EngineConfigSchema = z
  .object({
    baseUnit: z.enum(['millions', 'billions', 'trillions']).default('millions'),

    alignment: z
      .object({
        startDate: isoDate.nullable().default(null),
        dailyFillLimitDays: z.number().int().nonnegative().default(3),
        requiredColumns: z.array(z.string()).default(['fed_total_assets', 'rrp_balance', 'tga_balance']),
        /** target column -> faster source of the same series */
        supplements: z.record(z.string(), z.string()).default({}),
      })
      .default({}),

    metrics: z
      .object({
        spreads: z.array(spreadPairSchema).default([
          { id: 'spread_sofr_iorb', minuend: 'sofr_rate', subtrahend: 'iorb_rate', scale: 100 },
          { id: 'spread_effr_iorb', minuend: 'effr_rate', subtrahend: 'iorb_rate', scale: 100 },
          { id: 'spread_tgcr_sofr', minuend: 'tgcr_rate', subtrahend: 'sofr_rate', scale: 100 },
          { id: 'curve_2s10s', minuend: 'ust_10y', subtrahend: 'ust_2y', scale: 1 },
          { id: 'curve_5s30s', minuend: 'ust_30y', subtrahend: 'ust_5y', scale: 1 },
        ]),
        /** Columns that get _change/_weekly_change/... Net liquidity is always added */
        flowColumns: z.array(z.string()).default(['rrp_balance', 'repo_ops_balance']),
        horizons: z
          .object({
            weekly: z.number().int().positive().default(5),
            monthly: z.number().int().positive().default(22),
            quarterly: z.number().int().positive().default(65),
          })
          .default({}),
        maLong: z.number().int().positive().default(20),
        maLongMinPeriods: z.number().int().positive().default(10),
        maShort: z.number().int().positive().default(5),
        maShortMinPeriods: z.number().int().positive().default(2),
        volWindow: z.number().int().positive().default(5),
        volMinPeriods: z.number().int().positive().default(2),
        yoySessions: z.number().int().positive().default(252),
        /** percentage points above IORB */
        stressFlagMargin: z.number().nonnegative().default(0.05),
      })
      .default({}),

    temporal: z
      .object({
        fiscalYearStartMonth: z.number().int().min(1).max(12).default(1),
        rollingSessions: z.number().int().positive().default(63),
        percentileWindow: z.number().int().positive().default(63),
        percentBound: z.number().positive().default(500),
        annualizationFactor: z.number().positive().default(252),
        /** per-session slope (column units) separating Rising/Declining from Flat */
        trendSlopeThreshold: z.number().nonnegative().default(1000),
        columns: z
          .array(z.string())
          .default(['fed_total_assets', 'rrp_balance', 'tga_balance', 'net_liquidity', 'net_liquidity_ex_tga', 'spread_sofr_iorb']),
      })
      .default({}),

    spikes: z
      .object({
        column: z.string().default('spread_sofr_iorb'),
        minObservations: z.number().int().positive().default(20),
        maWindow: z.number().int().positive().default(20),
        maMinPeriods: z.number().int().positive().default(10),
        thresholdStd: z.number().positive().default(2),
        absoluteBps: z.number().default(10),
        percentileWindow: z.number().int().positive().default(63),
        percentileMinPeriods: z.number().int().positive().default(40),
        percentile: z.number().min(0).max(1).default(0.95),
        rollingSessions: z.number().int().positive().default(63),
      })
      .default({}),

    stress: z
      .object({
        weights: z
          .object({
            sofr_spread: z.number().nonnegative().default(0.3),
            effr_spread: z.number().nonnegative().default(0.2),
            volatility: z.number().nonnegative().default(0.15),
            rrp_usage: z.number().nonnegative().default(0.2),
            repo_usage: z.number().nonnegative().default(0.15),
          })
          .default({}),
        sofrSpreadCapBps: z.number().positive().default(20),
        effrSpreadFloorBps: z.number().default(-5),
        effrSpreadCapBps: z.number().positive().default(15),
        volatilityCapPct: z.number().positive().default(0.1),
        /** repo operations volume (base unit) mapped to a full score */
        repoUsageFullScale: z.number().positive().default(100_000),
        levels: z
          .object({
            moderate: z.number().default(25),
            elevated: z.number().default(50),
            high: z.number().default(75),
          })
          .default({}),
      })
      .default({}),

    regime: z
      .object({
        lookback: z.number().int().positive().default(20),
        assetsThreshold: z.number().nonnegative().default(10_000),
        rrpThreshold: z.number().nonnegative().default(50_000),
        qtPaceThreshold: z.number().nonnegative().default(5_000),
      })
      .default({}),

    composite: z
      .object({
        weights: z.record(z.string(), z.number().nonnegative()).default({ fiscal: 0.4, monetary: 0.35, plumbing: 0.25 }),
        subIndices: z.record(z.string(), z.array(compositeComponentSchema)).default({
          fiscal: [
            { columns: ['ma20_impulse'], transform: 'level', sign: 1, weight: 0.5 },
            { columns: ['tga_balance'], transform: 'diff', sign: -1, weight: 0.3 },
            { columns: ['withheld_tax'], transform: 'level', sign: -1, weight: 0.2 },
          ],
          monetary: [
            { columns: ['net_liquidity', 'net_liquidity_ex_tga'], transform: 'level', sign: 1, weight: 0.6 },
            { columns: ['rrp_balance_change'], transform: 'level', sign: -1, weight: 0.25 },
            { columns: ['spread_sofr_iorb'], transform: 'level', sign: -1, weight: 0.15 },
          ],
          plumbing: [
            { columns: ['repo_submission_ratio'], transform: 'level', sign: -1, weight: 0.6 },
            { columns: ['settlement_fails'], transform: 'level', sign: -1, weight: 0.4 },
          ],
        }),
        fastWindow: z.number().int().positive().default(5),
        slowWindow: z.number().int().positive().default(20),
        /** Ascending, right-inclusive cut points between the five bands */
        bandCuts: z.tuple([z.number(), z.number(), z.number(), z.number()]).default([-1, -0.5, 0.5, 1]),
      })
      .default({}),

    forecast: z
      .object({
        window: z.number().int().positive().default(20),
        minValid: z.number().int().min(2).default(10),
        horizon: z.number().int().positive().default(5),
        flatEpsilon: z.number().nonnegative().default(1e-12),
        columns: z.array(z.string()).default(['net_liquidity', 'net_liquidity_ex_tga', 'rrp_balance', 'fed_total_assets']),
      })
      .default({}),

    correlations: z
      .object({
        window: z.number().int().positive().default(63),
        minRows: z.number().int().positive().default(30),
        minPairs: z.number().int().min(2).default(10),
        pairs: z.array(correlationPairSchema).default([
          { id: 'net_liq_vs_tga', a: ['net_liquidity', 'net_liquidity_ex_tga'], b: ['tga_balance'] },
          { id: 'rrp_vs_sofr_spread', a: ['rrp_balance'], b: ['spread_sofr_iorb'] },
          { id: 'assets_vs_breakeven', a: ['fed_total_assets'], b: ['breakeven_10y'] },
          { id: 'net_liq_vs_spread', a: ['net_liquidity', 'net_liquidity_ex_tga'], b: ['spread_sofr_iorb'] },
        ]),
      })
      .default({}),

    alerts: z
      .object({
        stressCritical: z.number().default(75),
        stressWarning: z.number().default(50),
        rrpMtdPct: z.number().positive().default(50),
        qtPaceAnnualized: z.number().default(-1_000_000),
        percentileLow: z.number().default(10),
        percentileHigh: z.number().default(90),
        swapLines: z.number().nonnegative().default(1_000),
      })
      .default({}),

    freshness: z
      .object({
        daily: freshnessRuleSchema.default({ expectedLagDays: 2, staleAfterDays: 5 }),
        weekly: freshnessRuleSchema.default({ expectedLagDays: 6, staleAfterDays: 14 }),
        unknown: freshnessRuleSchema.default({ expectedLagDays: 7, staleAfterDays: 14 }),
        delayedGraceDays: z.number().int().nonnegative().default(2),
      })
      .default({}),

    dataQuality: z
      .object({
        netLiquidityToleranceAbs: z.number().nonnegative().default(1_000),
        netLiquidityToleranceRel: z.number().nonnegative().default(0.0005),
      })
      .default({}),

    fiscal: z
      .object({
        fiscalYearStartMonth: z.number().int().min(1).max(12).default(10),
        slidingWindow: z.number().int().positive().default(20),
        blockWeeks: z.number().int().positive().default(4),
        toleranceAbs: z.number().nonnegative().default(10_000),
        tolerancePct: z.number().nonnegative().default(1),
        yoySessions: z.number().int().positive().default(252),
        /** Annual nominal GDP in the base unit; the GDP-scaled impulse is skipped without it */
        nominalGdp: z.number().positive().nullable().default(null),
      })
      .default({}),

    plumbing: z
      .object({
        /** Per-category fails summed into settlement_fails when no total is supplied */
        failsColumns: z.array(z.string()).default(['fails_treasury', 'fails_agency', 'fails_mbs', 'fails_corporate']),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const groups: [string[], number[]][] = [
      [['stress', 'weights'], Object.values(config.stress.weights)],
      [['composite', 'weights'], Object.values(config.composite.weights)],
      ...Object.entries(config.composite.subIndices).map(
        ([id, components]): [string[], number[]] => [['composite', 'subIndices', id], components.map((c) => c.weight)]
      ),
    ]

    for (const [path, weights] of groups) {
      const total = weights.reduce((a, b) => a + b, 0)
      if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `weights must sum to 1 (got ${total})` })
      }
    }

    const cuts = config.composite.bandCuts
    if (cuts.some((cut, i) => i > 0 && cut <= cuts[i - 1])) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['composite', 'bandCuts'], message: 'cut points must be ascending' })
    }

    const { moderate, elevated, high } = config.stress.levels
    if (!(moderate < elevated && elevated < high)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stress', 'levels'], message: 'levels must be ascending' })
    }
  })

export type EngineConfig = z.output<typeof EngineConfigSchema>
export type EngineConfigOverrides = z.input<typeof EngineConfigSchema>

export type AlignmentConfig = EngineConfig['alignment']
export type MetricsConfig = EngineConfig['metrics']
export type TemporalConfig = EngineConfig['temporal']
export type SpikeConfig = EngineConfig['spikes']
export type StressConfig = EngineConfig['stress']
export type RegimeConfig = EngineConfig['regime']
export type CompositeConfig = EngineConfig['composite']
export type CompositeComponent = z.output<typeof compositeComponentSchema>
export type ForecastConfig = EngineConfig['forecast']
export type CorrelationConfig = EngineConfig['correlations']
export type AlertConfig = EngineConfig['alerts']
export type FreshnessConfig = EngineConfig['freshness']
export type FiscalConfig = EngineConfig['fiscal']
export type DataQualityConfig = EngineConfig['dataQuality']
export type PlumbingConfig = EngineConfig['plumbing']
export type SpreadPair = z.output<typeof spreadPairSchema>

// ============================================================================
// Resolution
// ============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

/**
 * Validate caller overrides against the schema and fill every default.
 * Nested sections merge key by key; arrays and records replace the default.
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(overrides)
  if (!result.success) {
    throw new ConfigError(result.error.issues)
  }
  return deepFreeze(result.data)
}

export const DEFAULT_CONFIG: EngineConfig = resolveConfig()
