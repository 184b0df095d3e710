/**
 * Monetary regime vote: balance-sheet trend, RRP trend and weekly QT pace.
 * Thresholds are in the base unit (millions by default).
 */

import { DEFAULT_CONFIG, type RegimeConfig } from '@/lib/config'
import { firstValidIndex, isValid, lastValidIndex } from '@/lib/analytics/rolling'
import { getColumn, lastValue } from '@/lib/analytics/table'
import type { AlignedTable, RegimeClassification, RegimeSignal } from '@/lib/analytics/types'

function trendOverLookback(table: AlignedTable, name: string, lookback: number): number | null {
  const column = getColumn(table, name)
  if (column === undefined) return null

  const from = Math.max(0, column.length - lookback)
  const first = firstValidIndex(column, from)
  const last = lastValidIndex(column, from)
  if (first === null || last === null || first === last) return null

  const a = column[first]
  const b = column[last]
  return isValid(a) && isValid(b) ? b - a : null
}

export function regimeSignals(table: AlignedTable, config: RegimeConfig = DEFAULT_CONFIG.regime): RegimeSignal[] {
  const signals: RegimeSignal[] = []

  const assetsTrend = trendOverLookback(table, 'fed_total_assets', config.lookback)
  if (assetsTrend !== null) {
    if (assetsTrend < -config.assetsThreshold) signals.push('QT')
    else if (assetsTrend > config.assetsThreshold) signals.push('QE')
    else signals.push('NEUTRAL')
  }

  // Falling RRP returns cash to the system
  const rrpTrend = trendOverLookback(table, 'rrp_balance', config.lookback)
  if (rrpTrend !== null) {
    if (rrpTrend < -config.rrpThreshold) signals.push('EASING')
    else if (rrpTrend > config.rrpThreshold) signals.push('TIGHTENING')
  }

  const flow = getColumn(table, 'net_balance_sheet_flow')
  const pace = flow ? lastValue(flow) : null
  if (pace !== null) {
    if (pace < -config.qtPaceThreshold) signals.push('QT')
    else if (pace > config.qtPaceThreshold) signals.push('QE')
  }

  return signals
}

export function classifyRegime(table: AlignedTable, config: RegimeConfig = DEFAULT_CONFIG.regime): RegimeClassification {
  if (table.dates.length < config.lookback) {
    return { regime: 'UNKNOWN', confidence: 0, signals: [] }
  }

  const signals = regimeSignals(table, config)
  if (signals.length === 0) {
    return { regime: 'UNKNOWN', confidence: 0, signals }
  }

  const tightening = signals.filter((s) => s === 'QT' || s === 'TIGHTENING').length
  const easing = signals.filter((s) => s === 'QE' || s === 'EASING').length

  if (tightening > easing) {
    return { regime: 'QT', confidence: Math.min(100, (tightening / signals.length) * 100), signals }
  }
  if (easing > tightening) {
    return { regime: 'QE', confidence: Math.min(100, (easing / signals.length) * 100), signals }
  }
  return { regime: 'NEUTRAL', confidence: 50, signals }
}
