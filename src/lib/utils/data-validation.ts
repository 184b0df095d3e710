/**
 * Data Quality Checks
 *
 * Freshness of each input series relative to its publication schedule,
 * bounds on derived shares, and a recomputation check of stored net liquidity.
 */

import { DEFAULT_CONFIG, type DataQualityConfig, type FreshnessConfig } from '@/lib/config'
import { daysBetween } from '@/lib/analytics/dates'
import { isValid } from '@/lib/analytics/rolling'
import { getColumn } from '@/lib/analytics/table'
import type { AlignedTable, Column, FreshnessReport, FreshnessStatus, SeriesFrequency, SeriesFreshness } from '@/lib/analytics/types'

// ============================================================================
// Freshness
// ============================================================================

export function freshnessStatus(daysOld: number, frequency: SeriesFrequency, config: FreshnessConfig = DEFAULT_CONFIG.freshness): FreshnessStatus {
  // Policy rates only move on decision dates
  if (frequency === 'policy-driven') return 'OK'

  const rule = config[frequency]
  if (daysOld > rule.staleAfterDays) return 'STALE'
  if (daysOld > rule.expectedLagDays + config.delayedGraceDays) return 'DELAYED'
  return 'OK'
}

export function checkDataFreshness(
  lastObservations: Record<string, string>,
  frequencies: Record<string, SeriesFrequency>,
  reportDate: string,
  config: FreshnessConfig = DEFAULT_CONFIG.freshness
): FreshnessReport {
  const series: SeriesFreshness[] = []
  const warnings: string[] = []

  for (const [seriesId, lastDate] of Object.entries(lastObservations).sort(([a], [b]) => a.localeCompare(b))) {
    const frequency = frequencies[seriesId] ?? 'unknown'
    const daysOld = daysBetween(lastDate, reportDate)
    const status = freshnessStatus(daysOld, frequency, config)
    series.push({ seriesId, lastDate, daysOld, frequency, status })

    if (status !== 'OK') {
      warnings.push(`${seriesId}: last observation ${lastDate} is ${daysOld} days old (${status})`)
    }
  }

  return { series, warnings }
}

// ============================================================================
// Bounds & Reconciliation
// ============================================================================

export interface BoundsCheck {
  checked: number
  outOfBounds: number
  passed: boolean
}

export function checkHouseholdShareBounds(values: Column, min: number = 0, max: number = 100): BoundsCheck {
  const valid = values.filter(isValid)
  const outOfBounds = valid.filter((v) => v < min || v > max).length
  return { checked: valid.length, outOfBounds, passed: outOfBounds === 0 }
}

export interface NetLiquidityReconciliation {
  checked: number
  mismatches: number
  maxDiscrepancy: number
  passed: boolean
}

/**
 * Compare stored net liquidity against assets - RRP - TGA row by row.
 * Null when the stored column or any input is missing.
 */
export function reconcileNetLiquidity(
  table: AlignedTable,
  config: DataQualityConfig = DEFAULT_CONFIG.dataQuality
): NetLiquidityReconciliation | null {
  const stored = getColumn(table, 'net_liquidity')
  const assets = getColumn(table, 'fed_total_assets')
  const rrp = getColumn(table, 'rrp_balance')
  const tga = getColumn(table, 'tga_balance')
  if (!stored || !assets || !rrp || !tga) return null

  let checked = 0
  let mismatches = 0
  let maxDiscrepancy = 0

  stored.forEach((value, i) => {
    const a = assets[i]
    const r = rrp[i]
    const t = tga[i]
    if (!isValid(value) || !isValid(a) || !isValid(r) || !isValid(t)) return

    const discrepancy = Math.abs(value - (a - r - t))
    const tolerance = Math.max(config.netLiquidityToleranceAbs, Math.abs(value) * config.netLiquidityToleranceRel)
    checked++
    maxDiscrepancy = Math.max(maxDiscrepancy, discrepancy)
    if (discrepancy > tolerance) mismatches++
  })

  return { checked, mismatches, maxDiscrepancy, passed: mismatches === 0 }
}
