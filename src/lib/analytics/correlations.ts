/**
 * Pearson correlations between liquidity metrics over the trailing quarter.
 */

import { DEFAULT_CONFIG, type CorrelationConfig } from '@/lib/config'
import { isValid } from './rolling'
import { firstPresent, getColumn } from './table'
import type { AlignedTable, Column } from './types'

/**
 * Pearson correlation coefficient; null when either side has no variance
 */
export function pearsonCorrelation(x: readonly number[], y: readonly number[]): number | null {
  if (x.length !== y.length || x.length < 2) return null

  const n = x.length
  const meanX = x.reduce((a, b) => a + b, 0) / n
  const meanY = y.reduce((a, b) => a + b, 0) / n

  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX
    const dy = y[i] - meanY
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  }

  const denominator = Math.sqrt(sxx * syy)
  if (denominator === 0) return null
  return Math.max(-1, Math.min(1, sxy / denominator))
}

/**
 * Rows where both columns hold a value
 */
export function pairwiseValid(a: Column, b: Column): { x: number[]; y: number[] } {
  const x: number[] = []
  const y: number[] = []
  a.forEach((va, i) => {
    const vb = b[i]
    if (isValid(va) && isValid(vb)) {
      x.push(va)
      y.push(vb)
    }
  })
  return { x, y }
}

export function computeLiquidityCorrelations(
  table: AlignedTable,
  config: CorrelationConfig = DEFAULT_CONFIG.correlations
): Record<string, number | null> {
  const result: Record<string, number | null> = {}
  if (table.dates.length < config.minRows) return result

  for (const pair of config.pairs) {
    const a = firstPresent(table, pair.a)
    const b = firstPresent(table, pair.b)
    const colA = a ? getColumn(table, a) : undefined
    const colB = b ? getColumn(table, b) : undefined
    if (colA === undefined || colB === undefined) continue

    const { x, y } = pairwiseValid(colA.slice(-config.window), colB.slice(-config.window))
    result[pair.id] = x.length >= config.minPairs ? pearsonCorrelation(x, y) : null
  }

  return result
}
