/**
 * Linear trend forecasting over the most recent sessions.
 */

import { DEFAULT_CONFIG, type ForecastConfig } from '@/lib/config'
import { isValid } from '@/lib/analytics/rolling'
import type { Column, TrendForecast, TrendLabel } from '@/lib/analytics/types'

export interface LinearFit {
  slope: number
  intercept: number
  rSquared: number
}

/**
 * Ordinary least squares on (x, y) pairs. Needs two distinct x values.
 * R² is 0 when y has no variance.
 */
export function linearFit(xs: readonly number[], ys: readonly number[]): LinearFit | null {
  const n = Math.min(xs.length, ys.length)
  if (n < 2) return null

  let sumX = 0
  let sumY = 0
  for (let i = 0; i < n; i++) {
    sumX += xs[i]
    sumY += ys[i]
  }
  const meanX = sumX / n
  const meanY = sumY / n

  let sxx = 0
  let sxy = 0
  let ssTot = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX
    const dy = ys[i] - meanY
    sxx += dx * dx
    sxy += dx * dy
    ssTot += dy * dy
  }
  if (sxx === 0) return null

  const slope = sxy / sxx
  const intercept = meanY - slope * meanX

  if (ssTot <= 1e-12 * n * Math.max(1, meanY * meanY)) {
    return { slope, intercept, rSquared: 0 }
  }

  let ssRes = 0
  for (let i = 0; i < n; i++) {
    const residual = ys[i] - (intercept + slope * xs[i])
    ssRes += residual * residual
  }

  return { slope, intercept, rSquared: Math.max(0, 1 - ssRes / ssTot) }
}

export function trendLabel(slope: number, threshold: number): TrendLabel {
  if (slope > threshold) return 'Rising'
  if (slope < -threshold) return 'Declining'
  return 'Flat'
}

/**
 * Fit a line through the valid points of the last `window` rows (indexed
 * densely, so gaps do not stretch the x axis) and project it `horizon`
 * sessions past the last point.
 */
export function forecastTrend(
  column: string,
  values: Column,
  config: ForecastConfig = DEFAULT_CONFIG.forecast
): TrendForecast | null {
  const ys = values.slice(-config.window).filter(isValid)
  if (ys.length < config.minValid) return null

  const xs = ys.map((_, i) => i)
  const fit = linearFit(xs, ys)
  if (fit === null) return null

  const n = ys.length
  const mean = ys.reduce((a, b) => a + b, 0) / n
  const flatBand = config.flatEpsilon * Math.max(1, Math.abs(mean))
  const path = Array.from({ length: config.horizon }, (_, k) => fit.intercept + fit.slope * (n + k))

  return {
    column,
    slope: fit.slope,
    intercept: fit.intercept,
    current: ys[n - 1],
    horizon: config.horizon,
    forecast: fit.intercept + fit.slope * (n - 1 + config.horizon),
    path,
    trend: trendLabel(fit.slope, flatBand),
    rSquared: fit.rSquared,
    points: n,
  }
}
