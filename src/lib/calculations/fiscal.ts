/**
 * Fiscal Impulse
 *
 * Daily Treasury cash flows turned into an impulse series (spending minus
 * taxes) with smoothing, month, 4-week and fiscal-year-to-date accumulation,
 * comparisons against the same sessions one to three years back, and a check
 * that the sliding 20-session sum agrees with a calendar-week block sum.
 *
 * The impulse averages need a full window, unlike the half-window averages of
 * the balance sheet metrics.
 */

import { DEFAULT_CONFIG, type FiscalConfig } from '@/lib/config'
import { fiscalYearStart, shiftDays, weekStart } from '@/lib/analytics/dates'
import { isValid, rollingMean, rollingSum, shift } from '@/lib/analytics/rolling'
import { applyTransform, combineColumns, defineTransform, getColumn, lastValue, mapColumn } from '@/lib/analytics/table'
import type { AlignedTable, Column, DerivationReport, FourWeekReconciliation, Units } from '@/lib/analytics/types'
import { monthToDateSum } from './liquidity'

const SESSIONS_PER_WEEK = 5

/**
 * household / total × 100, clamped to [0, 100]; 0 when total is not positive
 */
export function householdSharePct(household: number, total: number): number {
  if (!Number.isFinite(household) || !Number.isFinite(total) || total <= 0) return 0
  return Math.min(100, Math.max(0, (household / total) * 100))
}

/**
 * Running sum that restarts on the first session of each fiscal year
 */
export function fiscalYearToDateSum(dates: readonly string[], values: Column, fiscalYearStartMonth: number): Column {
  let year = ''
  let total = 0

  return values.map((v, i) => {
    const key = fiscalYearStart(dates[i], fiscalYearStartMonth)
    if (key !== year) {
      year = key
      total = 0
    }
    if (!isValid(v)) return null
    total += v
    return total
  })
}

/**
 * Weekly impulse (20-session average × 5) as a percent of annual nominal GDP
 */
export function impulsePctGdp(ma20Impulse: Column, nominalGdp: number): Column {
  return mapColumn(ma20Impulse, (v) => ((v * SESSIONS_PER_WEEK) / nominalGdp) * 100)
}

/**
 * Mean of the same row one, two and three years back; null unless all three exist
 */
export function threeYearBaseline(values: Column, yearSessions: number): Column {
  const years = [1, 2, 3].map((n) => shift(values, n * yearSessions))
  return values.map((_, i) => {
    const past = years.map((year) => year[i])
    return past.every(isValid) ? past.reduce((a, b) => a + b, 0) / past.length : null
  })
}

export function deriveFiscalMetrics(
  table: AlignedTable,
  config: FiscalConfig = DEFAULT_CONFIG.fiscal,
  baseUnit: Units = DEFAULT_CONFIG.baseUnit
): Pick<DerivationReport, 'applied' | 'omitted'> {
  const report: Pick<DerivationReport, 'applied' | 'omitted'> = { applied: [], omitted: [] }
  const yearBack = (values: Column) => shift(values, config.yoySessions)

  applyTransform(
    table,
    defineTransform({
      id: 'net_impulse',
      required: ['total_spending', 'total_taxes'],
      outputs: { net_impulse: baseUnit },
      compute: (input) => ({
        net_impulse: combineColumns(input.required('total_spending'), input.required('total_taxes'), (s, t) => s - t),
      }),
    }),
    report
  )

  applyTransform(
    table,
    defineTransform({
      id: 'impulse_accumulation',
      required: ['net_impulse'],
      outputs: {
        ma20_impulse: baseUnit,
        ma5_impulse: baseUnit,
        mtd_impulse: baseUnit,
        four_week_cum_impulse: baseUnit,
        fytd_impulse: baseUnit,
      },
      compute: (input, t) => {
        const impulse = input.required('net_impulse')
        return {
          ma20_impulse: rollingMean(impulse, 20),
          ma5_impulse: rollingMean(impulse, 5),
          mtd_impulse: monthToDateSum(t.dates, impulse),
          four_week_cum_impulse: rollingSum(impulse, config.slidingWindow),
          fytd_impulse: fiscalYearToDateSum(t.dates, impulse, config.fiscalYearStartMonth),
        }
      },
    }),
    report
  )

  const { nominalGdp } = config
  if (nominalGdp === null) {
    report.omitted.push({ id: 'impulse_weekly_pct_gdp', missing: ['nominal_gdp'] })
  } else {
    applyTransform(
      table,
      defineTransform({
        id: 'impulse_weekly_pct_gdp',
        required: ['ma20_impulse'],
        outputs: { impulse_weekly_pct_gdp: 'percent' },
        compute: (input) => ({ impulse_weekly_pct_gdp: impulsePctGdp(input.required('ma20_impulse'), nominalGdp) }),
      }),
      report
    )
  }

  applyTransform(
    table,
    defineTransform({
      id: 'impulse_year_over_year',
      required: ['net_impulse', 'ma20_impulse', 'fytd_impulse', 'four_week_cum_impulse'],
      outputs: {
        prev_year_impulse: baseUnit,
        prev_year_ma20_impulse: baseUnit,
        prev_year_fytd_impulse: baseUnit,
        prev_year_four_week_cum_impulse: baseUnit,
        impulse_delta_yoy: baseUnit,
        cum_diff_yoy: baseUnit,
        yoy_four_week_cum_impulse: baseUnit,
      },
      compute: (input) => {
        const impulse = input.required('net_impulse')
        const fytd = input.required('fytd_impulse')
        const fourWeek = input.required('four_week_cum_impulse')
        const prevImpulse = yearBack(impulse)
        const prevFytd = yearBack(fytd)
        const prevFourWeek = yearBack(fourWeek)
        const minus = (a: number, b: number) => a - b
        return {
          prev_year_impulse: prevImpulse,
          prev_year_ma20_impulse: yearBack(input.required('ma20_impulse')),
          prev_year_fytd_impulse: prevFytd,
          prev_year_four_week_cum_impulse: prevFourWeek,
          impulse_delta_yoy: combineColumns(impulse, prevImpulse, minus),
          cum_diff_yoy: combineColumns(fytd, prevFytd, minus),
          yoy_four_week_cum_impulse: combineColumns(fourWeek, prevFourWeek, minus),
        }
      },
    }),
    report
  )

  applyTransform(
    table,
    defineTransform({
      id: 'impulse_three_year_baseline',
      required: ['ma20_impulse'],
      outputs: { three_year_avg_ma20_impulse: baseUnit },
      compute: (input) => ({
        three_year_avg_ma20_impulse: threeYearBaseline(input.required('ma20_impulse'), config.yoySessions),
      }),
    }),
    report
  )

  applyTransform(
    table,
    defineTransform({
      id: 'household_share_pct',
      required: ['household_spending', 'total_spending'],
      outputs: { household_share_pct: 'percent' },
      compute: (input) => ({
        household_share_pct: combineColumns(input.required('household_spending'), input.required('total_spending'), householdSharePct),
      }),
    }),
    report
  )

  applyTransform(
    table,
    defineTransform({
      id: 'household_ma20',
      required: ['household_spending'],
      outputs: { ma20_household: baseUnit },
      compute: (input) => ({ ma20_household: rollingMean(input.required('household_spending'), 20) }),
    }),
    report
  )

  return report
}

/**
 * Sum of net impulse over the last `blockWeeks` Monday-start weeks, the last
 * one being the week that contains the table's final date
 */
export function fourWeekBlockImpulse(table: AlignedTable, config: FiscalConfig = DEFAULT_CONFIG.fiscal): number | null {
  const impulse = getColumn(table, 'net_impulse')
  const end = table.dates[table.dates.length - 1]
  if (impulse === undefined || end === undefined) return null

  const blockStart = shiftDays(weekStart(end), -7 * (config.blockWeeks - 1))
  const inBlock = impulse.filter((v, i): v is number => isValid(v) && table.dates[i] >= blockStart)
  return inBlock.length > 0 ? inBlock.reduce((a, b) => a + b, 0) : null
}

export function reconcileFourWeekImpulse(table: AlignedTable, config: FiscalConfig = DEFAULT_CONFIG.fiscal): FourWeekReconciliation {
  const slidingColumn = getColumn(table, 'four_week_cum_impulse')
  const sliding = slidingColumn ? lastValue(slidingColumn) : null
  const block = fourWeekBlockImpulse(table, config)

  if (sliding === null || block === null) {
    return { sliding, block, discrepancy: null, discrepancyPct: null, withinTolerance: false }
  }

  const discrepancy = sliding - block
  const discrepancyPct = block !== 0 ? (Math.abs(discrepancy) / Math.abs(block)) * 100 : discrepancy === 0 ? 0 : null
  const withinTolerance =
    Math.abs(discrepancy) <= config.toleranceAbs && discrepancyPct !== null && discrepancyPct <= config.tolerancePct

  if (!withinTolerance) {
    console.warn(`[fiscal] 4-week impulse mismatch: sliding ${sliding} vs block ${block}`)
  }

  return { sliding, block, discrepancy, discrepancyPct, withinTolerance }
}
