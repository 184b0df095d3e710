/**
 * Funding Stress Index (0-100)
 *
 * Five components read from the latest row, each clamped to its range before
 * scaling and again to [0, 100] after. Spreads are in basis points and
 * balances in the base unit.
 */

import { DEFAULT_CONFIG, type MetricsConfig, type StressConfig } from '@/lib/config'
import { isValid } from '@/lib/analytics/rolling'
import { getColumn, lastValue } from '@/lib/analytics/table'
import type { AlignedTable, StressComponent, StressComponentId, StressIndex, StressLevel } from '@/lib/analytics/types'

export interface StressInputs {
  sofrSpreadBps: number | null
  effrSpreadBps: number | null
  sofrVolatility: number | null
  rrpBalance: number | null
  rrpMovingAverage: number | null
  repoOpsBalance: number | null
}

const COMPONENT_LABELS: Record<StressComponentId, string> = {
  sofr_spread: 'SOFR-IORB spread',
  effr_spread: 'EFFR-IORB spread',
  volatility: 'SOFR 5-day volatility',
  rrp_usage: 'RRP drawdown vs long moving average',
  repo_usage: 'Repo operations usage',
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function toScore(value: number): number {
  return Number.isFinite(value) ? clamp(value, 0, 100) : 0
}

/**
 * Latest row of every stress input. The RRP average is the long moving average
 * `deriveMetrics` wrote under the same metrics config.
 */
export function latestStressInputs(table: AlignedTable, metrics: MetricsConfig = DEFAULT_CONFIG.metrics): StressInputs {
  const latest = (name: string): number | null => {
    const column = getColumn(table, name)
    return column ? lastValue(column) : null
  }

  return {
    sofrSpreadBps: latest('spread_sofr_iorb'),
    effrSpreadBps: latest('spread_effr_iorb'),
    sofrVolatility: latest('sofr_vol_5d'),
    rrpBalance: latest('rrp_balance'),
    rrpMovingAverage: latest(`ma${metrics.maLong}_rrp_balance`),
    repoOpsBalance: latest('repo_ops_balance'),
  }
}

// ============================================================================
// Components
// ============================================================================

type ComponentScorer = (inputs: StressInputs, config: StressConfig) => number | null

const SCORERS: Record<StressComponentId, ComponentScorer> = {
  sofr_spread: ({ sofrSpreadBps }, { sofrSpreadCapBps }) => {
    if (!isValid(sofrSpreadBps)) return null
    return (clamp(sofrSpreadBps, 0, sofrSpreadCapBps) / sofrSpreadCapBps) * 100
  },

  // Only a positive EFFR-IORB spread signals stress
  effr_spread: ({ effrSpreadBps }, { effrSpreadFloorBps, effrSpreadCapBps }) => {
    if (!isValid(effrSpreadBps)) return null
    const spread = clamp(effrSpreadBps, effrSpreadFloorBps, effrSpreadCapBps)
    return spread > 0 ? (spread / effrSpreadCapBps) * 100 : 0
  },

  volatility: ({ sofrVolatility }, { volatilityCapPct }) => {
    if (!isValid(sofrVolatility)) return null
    return (clamp(sofrVolatility, 0, volatilityCapPct) / volatilityCapPct) * 100
  },

  // Low RRP relative to its average means cash has left the facility
  rrp_usage: ({ rrpBalance, rrpMovingAverage }) => {
    if (!isValid(rrpBalance) || !isValid(rrpMovingAverage)) return null
    if (rrpMovingAverage <= 0) return 0
    return (1 - rrpBalance / rrpMovingAverage) * 100
  },

  repo_usage: ({ repoOpsBalance }, { repoUsageFullScale }) => {
    if (!isValid(repoOpsBalance)) return null
    return (Math.max(0, repoOpsBalance) / repoUsageFullScale) * 100
  },
}

export function stressLevel(score: number, levels: StressConfig['levels'] = DEFAULT_CONFIG.stress.levels): StressLevel {
  if (score >= levels.high) return 'HIGH STRESS'
  if (score >= levels.elevated) return 'ELEVATED'
  if (score >= levels.moderate) return 'MODERATE'
  return 'LOW'
}

/**
 * Weighted sum of the component scores. A missing input scores 0 at its
 * weight; when no input is available at all the index is absent.
 */
export function computeStressIndex(inputs: StressInputs, config: StressConfig = DEFAULT_CONFIG.stress): StressIndex {
  const ids: StressComponentId[] = ['sofr_spread', 'effr_spread', 'volatility', 'rrp_usage', 'repo_usage']

  const components: StressComponent[] = ids.map((id) => {
    const raw = SCORERS[id](inputs, config)
    return {
      id,
      label: COMPONENT_LABELS[id],
      value: raw === null ? 0 : toScore(raw),
      weight: config.weights[id],
      available: raw !== null,
    }
  })

  const componentsAvailable = components.filter((c) => c.available).length
  if (componentsAvailable === 0) {
    return { score: null, level: null, components, componentsAvailable }
  }

  const score = toScore(components.reduce((sum, c) => sum + c.value * c.weight, 0))
  return { score, level: stressLevel(score, config.levels), components, componentsAvailable }
}
