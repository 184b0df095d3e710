/**
 * Liquidity Metrics Derivation
 *
 * Appends derived columns to an aligned table: unit normalization, net
 * liquidity, rate spreads, multi-horizon changes, the quantity/quality
 * decomposition of policy stance, moving averages, SOFR stress flags,
 * year-over-year and month-to-date changes.
 *
 * All monetary arithmetic happens after normalization to the base unit.
 */

import { DEFAULT_CONFIG, type EngineConfig, type MetricsConfig, type SpreadPair } from '@/lib/config'
import { diff, forwardFill, isValid, rollingMean, rollingStd, shift } from '@/lib/analytics/rolling'
import {
  applyTransform,
  combineColumns,
  defineTransform,
  getColumn,
  isPresent,
  mapColumn,
} from '@/lib/analytics/table'
import type { AlignedTable, Column, DerivationReport, MonetaryUnit, Units } from '@/lib/analytics/types'

// ============================================================================
// Unit Normalization
// ============================================================================

const MILLIONS_PER_UNIT: Record<MonetaryUnit, number> = {
  millions: 1,
  billions: 1_000,
  trillions: 1_000_000,
}

export function isMonetaryUnit(units: Units): units is MonetaryUnit {
  return Object.hasOwn(MILLIONS_PER_UNIT, units)
}

/**
 * Rescale every monetary column to `baseUnit` in place. Columns already in the
 * base unit are untouched, so repeated calls change nothing.
 */
export function normalizeUnits(table: AlignedTable, baseUnit: MonetaryUnit): string[] {
  const converted: string[] = []

  for (const [name, units] of Object.entries(table.units)) {
    const values = getColumn(table, name)
    if (values === undefined || !isMonetaryUnit(units) || units === baseUnit) continue
    const factor = MILLIONS_PER_UNIT[units] / MILLIONS_PER_UNIT[baseUnit]
    table.columns[name] = mapColumn(values, (v) => v * factor)
    table.units[name] = baseUnit
    converted.push(name)
  }

  return converted
}

// ============================================================================
// Column Helpers
// ============================================================================

/**
 * value - first valid value of the same calendar month
 */
export function monthToDateChange(dates: readonly string[], values: Column): Column {
  let month = ''
  let anchor: number | null = null

  return values.map((v, i) => {
    const key = dates[i].slice(0, 7)
    if (key !== month) {
      month = key
      anchor = null
    }
    if (!isValid(v)) return null
    if (anchor === null) anchor = v
    return v - anchor
  })
}

/**
 * Running sum within each calendar month; missing rows stay missing
 */
export function monthToDateSum(dates: readonly string[], values: Column): Column {
  let month = ''
  let total = 0

  return values.map((v, i) => {
    const key = dates[i].slice(0, 7)
    if (key !== month) {
      month = key
      total = 0
    }
    if (!isValid(v)) return null
    total += v
    return total
  })
}

function spreadUnits(pair: SpreadPair): Units {
  return pair.scale === 100 ? 'basis-points' : 'percent'
}

// ============================================================================
// Transforms
// ============================================================================

function spreadTransform(pair: SpreadPair) {
  return defineTransform({
    id: pair.id,
    required: [pair.minuend, pair.subtrahend],
    outputs: { [pair.id]: spreadUnits(pair) },
    compute: (input) => ({
      [pair.id]: combineColumns(input.required(pair.minuend), input.required(pair.subtrahend), (a, b) => (a - b) * pair.scale),
    }),
  })
}

function changeTransform(column: string, units: Units, horizons: MetricsConfig['horizons']) {
  return defineTransform({
    id: `${column}_changes`,
    required: [column],
    outputs: {
      [`${column}_change`]: units,
      [`${column}_weekly_change`]: units,
      [`${column}_monthly_change`]: units,
      [`${column}_quarterly_change`]: units,
    },
    compute: (input) => {
      const raw = input.required(column)
      const filled = forwardFill(raw)
      return {
        [`${column}_change`]: diff(raw, 1),
        [`${column}_weekly_change`]: diff(filled, horizons.weekly),
        [`${column}_monthly_change`]: diff(filled, horizons.monthly),
        [`${column}_quarterly_change`]: diff(filled, horizons.quarterly),
      }
    },
  })
}

function movingAverageTransform(column: string, units: Units, config: MetricsConfig) {
  return defineTransform({
    id: `${column}_moving_averages`,
    required: [column],
    outputs: { [`ma${config.maLong}_${column}`]: units, [`ma${config.maShort}_${column}`]: units },
    compute: (input) => ({
      [`ma${config.maLong}_${column}`]: rollingMean(input.required(column), config.maLong, config.maLongMinPeriods),
      [`ma${config.maShort}_${column}`]: rollingMean(input.required(column), config.maShort, config.maShortMinPeriods),
    }),
  })
}

function yearOverYearTransform(column: string, units: Units, sessions: number) {
  return defineTransform({
    id: `yoy_${column}`,
    required: [column],
    outputs: { [`yoy_${column}_change`]: units },
    compute: (input) => {
      const values = input.required(column)
      return { [`yoy_${column}_change`]: combineColumns(values, shift(values, sessions), (now, then) => now - then) }
    },
  })
}

function monthToDateTransform(column: string, units: Units) {
  return defineTransform({
    id: `mtd_${column}`,
    required: [column],
    outputs: { [`mtd_${column}_change`]: units },
    compute: (input, table) => ({ [`mtd_${column}_change`]: monthToDateChange(table.dates, input.required(column)) }),
  })
}

/**
 * Quantity (net balance sheet flow) and quality (reinvestment + repo support)
 * are kept in separate columns. Reinvestment is already inside the asset flow,
 * so adding the two would count bill purchases twice.
 */
function policyStanceTransforms(units: Units, weekly: number) {
  const runoff = defineTransform({
    id: 'mbs_runoff_weekly',
    required: ['fed_mbs_holdings'],
    outputs: { mbs_runoff_weekly: units },
    compute: (input) => ({ mbs_runoff_weekly: mapColumn(diff(input.required('fed_mbs_holdings'), weekly), (v) => -v) }),
  })

  const bills = defineTransform({
    id: 'bill_purchases_weekly',
    required: ['fed_bill_holdings'],
    outputs: { bill_purchases_weekly: units },
    compute: (input) => ({ bill_purchases_weekly: diff(input.required('fed_bill_holdings'), weekly) }),
  })

  const reinvestment = defineTransform({
    id: 'mbs_to_bills_reinvestment',
    required: ['mbs_runoff_weekly', 'bill_purchases_weekly'],
    outputs: { mbs_to_bills_reinvestment: units },
    compute: (input) => {
      const purchases = input.required('bill_purchases_weekly')
      return {
        mbs_to_bills_reinvestment: input.required('mbs_runoff_weekly').map((r, i) => {
          const p = purchases[i]
          return isValid(r) && isValid(p) && r > 0 && p > 0 ? Math.min(r, p) : 0
        }),
      }
    },
  })

  const quantity = defineTransform({
    id: 'net_balance_sheet_flow',
    required: ['fed_total_assets'],
    outputs: { net_balance_sheet_flow: units, qt_pace_nominal: units },
    compute: (input) => {
      const flow = diff(input.required('fed_total_assets'), weekly)
      return { net_balance_sheet_flow: flow, qt_pace_nominal: mapColumn(flow, (v) => -v) }
    },
  })

  const quality = defineTransform({
    id: 'qualitative_easing_support',
    required: ['mbs_to_bills_reinvestment', 'repo_ops_balance'],
    outputs: { qualitative_easing_support: units },
    compute: (input) => ({
      qualitative_easing_support: combineColumns(
        input.required('mbs_to_bills_reinvestment'),
        input.required('repo_ops_balance'),
        (a, b) => a + b
      ),
    }),
  })

  return [runoff, bills, reinvestment, quantity, quality]
}

function sofrStressTransform(config: MetricsConfig) {
  return defineTransform({
    id: 'sofr_stress',
    required: ['sofr_rate'],
    optional: ['iorb_rate'],
    outputs: { sofr_vol_5d: 'percent', stress_flag: 'index' },
    compute: (input) => {
      const sofr = input.required('sofr_rate')
      const iorb = input.optional('iorb_rate')
      return {
        sofr_vol_5d: rollingStd(sofr, config.volWindow, config.volMinPeriods),
        stress_flag: sofr.map((s, i) => {
          const floor = iorb?.[i]
          return isValid(s) && isValid(floor) && s > floor + config.stressFlagMargin ? 1 : 0
        }),
      }
    },
  })
}

// ============================================================================
// Net Liquidity
// ============================================================================

function resolveNetLiquidity(table: AlignedTable, baseUnit: MonetaryUnit, report: DerivationReport): void {
  const assets = getColumn(table, 'fed_total_assets')
  const rrp = getColumn(table, 'rrp_balance')

  if (!isPresent(table, 'fed_total_assets') || !isPresent(table, 'rrp_balance') || !assets || !rrp) {
    report.netLiquidityVariant = 'unavailable'
    report.omitted.push({
      id: 'net_liquidity',
      missing: ['fed_total_assets', 'rrp_balance'].filter((name) => !isPresent(table, name)),
    })
    console.warn('[metrics] net liquidity unavailable: balance sheet or RRP series missing')
    return
  }

  const exTga = combineColumns(assets, rrp, (a, r) => a - r)
  const tga = getColumn(table, 'tga_balance')

  if (tga !== undefined && isPresent(table, 'tga_balance')) {
    table.columns.net_liquidity = combineColumns(exTga, tga, (n, t) => n - t)
    table.units.net_liquidity = baseUnit
    report.netLiquidityVariant = 'full'
    report.netLiquidityColumn = 'net_liquidity'
    report.applied.push('net_liquidity')
    return
  }

  table.columns.net_liquidity_ex_tga = exTga
  table.units.net_liquidity_ex_tga = baseUnit
  report.netLiquidityVariant = 'ex-tga'
  report.netLiquidityColumn = 'net_liquidity_ex_tga'
  report.applied.push('net_liquidity_ex_tga')
  console.warn('[metrics] TGA missing, net liquidity computed as assets - RRP (net_liquidity_ex_tga)')
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Derive every metric whose inputs are available, appending columns to
 * `table` in place. Running it again on the same table produces the same
 * columns.
 */
export function deriveMetrics(table: AlignedTable, config: EngineConfig = DEFAULT_CONFIG): DerivationReport {
  const { baseUnit, metrics } = config
  const report: DerivationReport = {
    applied: [],
    omitted: [],
    netLiquidityVariant: 'unavailable',
    netLiquidityColumn: null,
  }

  const converted = normalizeUnits(table, baseUnit)
  if (converted.length > 0) {
    console.log(`[metrics] normalized ${converted.join(', ')} to ${baseUnit}`)
  }

  resolveNetLiquidity(table, baseUnit, report)
  const netLiquidity = report.netLiquidityColumn

  const transforms = [
    ...metrics.spreads.map(spreadTransform),
    ...policyStanceTransforms(baseUnit, metrics.horizons.weekly),
    sofrStressTransform(metrics),
  ]

  const flowColumns = netLiquidity ? [...metrics.flowColumns, netLiquidity] : metrics.flowColumns
  const unitsOf = (name: string): Units => table.units[name] ?? baseUnit

  for (const transform of transforms) applyTransform<string, string, string>(table, transform, report)
  for (const column of flowColumns) applyTransform(table, changeTransform(column, unitsOf(column), metrics.horizons), report)

  const averaged = ['rrp_balance', 'fed_total_assets', 'spread_sofr_iorb', ...(netLiquidity ? [netLiquidity] : [])]
  for (const column of averaged) applyTransform(table, movingAverageTransform(column, unitsOf(column), metrics), report)

  const yearly = ['rrp_balance', 'fed_total_assets', ...(netLiquidity ? [netLiquidity] : [])]
  for (const column of yearly) applyTransform(table, yearOverYearTransform(column, unitsOf(column), metrics.yoySessions), report)

  const monthly = ['fed_total_assets', ...(netLiquidity ? [netLiquidity] : [])]
  for (const column of monthly) applyTransform(table, monthToDateTransform(column, unitsOf(column)), report)

  applyTransform(
    table,
    defineTransform({
      id: 'mtd_rrp_balance_flow',
      required: ['rrp_balance_change'],
      outputs: { mtd_rrp_balance_flow: unitsOf('rrp_balance') },
      compute: (input, t) => ({ mtd_rrp_balance_flow: monthToDateSum(t.dates, input.required('rrp_balance_change')) }),
    }),
    report
  )

  if (report.omitted.length > 0) {
    console.warn(`[metrics] omitted ${report.omitted.map((m) => `${m.id} (missing ${m.missing.join(', ')})`).join('; ')}`)
  }

  return report
}
