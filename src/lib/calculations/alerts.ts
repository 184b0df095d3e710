import { DEFAULT_CONFIG, type AlertConfig } from '@/lib/config'
import type { Alert, SpikeAnalysis, StressIndex, TemporalSummary } from '@/lib/analytics/types'
import { formatBps, formatMillions, formatPercentage, formatSigned } from '@/lib/utils/format'

export interface AlertInputs {
  stress: StressIndex
  spikes: SpikeAnalysis | null
  rrp: TemporalSummary | null
  assets: TemporalSummary | null
  netLiquidity: TemporalSummary | null
  /** Latest central-bank swap line balance, base unit */
  swapLines: number | null
}

/**
 * Threshold checks over one run's summary, most severe conditions first
 */
export function checkAlerts(inputs: AlertInputs, config: AlertConfig = DEFAULT_CONFIG.alerts): Alert[] {
  const alerts: Alert[] = []
  const { stress, spikes, rrp, assets, netLiquidity, swapLines } = inputs

  if (stress.score !== null) {
    if (stress.score >= config.stressCritical) {
      alerts.push({ severity: 'CRITICAL', type: 'STRESS', message: `Stress index at ${stress.score.toFixed(0)}/100 (HIGH STRESS)` })
    } else if (stress.score >= config.stressWarning) {
      alerts.push({ severity: 'WARNING', type: 'STRESS', message: `Stress index at ${stress.score.toFixed(0)}/100 (ELEVATED)` })
    }
  }

  if (spikes?.isSpike && (spikes.severity === 'CRITICAL' || spikes.severity === 'WARNING')) {
    alerts.push({
      severity: spikes.severity,
      type: 'SPREAD_SPIKE',
      message: `${spikes.column} spike: ${formatBps(spikes.current, 2)} (${spikes.severity})`,
    })
  }

  const rrpMtd = rrp?.mtd
  if (rrpMtd && rrpMtd.change !== null && rrpMtd.changePct !== null && Math.abs(rrpMtd.changePct) > config.rrpMtdPct) {
    alerts.push({
      severity: 'INFO',
      type: 'RRP_FLOW',
      message: `Large RRP movement: ${formatMillions(rrpMtd.change)} MTD (${formatSigned(rrpMtd.changePct)}%)`,
    })
  }

  const pace = assets?.qtd?.annualizedPace ?? null
  if (pace !== null && pace < config.qtPaceAnnualized) {
    alerts.push({ severity: 'WARNING', type: 'QT_PACE', message: `Aggressive QT pace: ${formatMillions(pace)}/year annualized` })
  }

  const percentile = netLiquidity?.rolling3m?.percentile ?? null
  if (percentile !== null) {
    if (percentile < config.percentileLow) {
      alerts.push({
        severity: 'WARNING',
        type: 'LIQUIDITY',
        message: `Net liquidity at ${formatPercentage(percentile, 0)} 3M percentile (very low)`,
      })
    } else if (percentile > config.percentileHigh) {
      alerts.push({
        severity: 'INFO',
        type: 'LIQUIDITY',
        message: `Net liquidity at ${formatPercentage(percentile, 0)} 3M percentile (very high)`,
      })
    }
  }

  if (swapLines !== null && swapLines > config.swapLines) {
    alerts.push({ severity: 'CRITICAL', type: 'SWAP_LINES', message: `Central bank swap lines active: ${formatMillions(swapLines)}` })
  }

  return alerts
}
