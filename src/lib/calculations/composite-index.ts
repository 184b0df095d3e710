/**
 * Liquidity Composite Index
 *
 * Each sub-index is a weighted sum of whole-sample z-scores of its inputs,
 * signed so that higher always means more liquidity. The composite weights
 * sub-indices without renormalizing: a missing sub-index contributes 0.
 */

import { DEFAULT_CONFIG, type CompositeComponent, type CompositeConfig } from '@/lib/config'
import { diff, isValid, mean, rollingMean, sampleStd, validValues } from '@/lib/analytics/rolling'
import { firstPresent, getColumn, mapColumn } from '@/lib/analytics/table'
import type { AlignedTable, Column, CompositeBand, CompositeIndexRecord } from '@/lib/analytics/types'

const BANDS: CompositeBand[] = ['Very Tight', 'Tight', 'Neutral', 'Easy', 'Very Easy']

/**
 * (x - mean) / sample std over this column's own valid values. A constant
 * column, or one with fewer than two values, maps every valid entry to 0.
 */
export function zScoreNormalize(values: Column): Column {
  const valid = validValues(values)
  const m = mean(valid)
  const std = sampleStd(valid)
  if (m === null || std === null || std === 0) return mapColumn(values, () => 0)
  return mapColumn(values, (v) => (v - m) / std)
}

function transformColumn(values: Column, component: CompositeComponent): Column {
  const transformed = component.transform === 'diff' ? diff(values, 1) : values
  return mapColumn(transformed, (v) => component.sign * v)
}

/**
 * Null when none of the components has a column in the table. On a date
 * where no available component has a value the sub-index is null too.
 */
export function buildSubIndex(table: AlignedTable, components: readonly CompositeComponent[]): Column | null {
  const parts: { weight: number; z: Column }[] = []

  for (const component of components) {
    const name = firstPresent(table, component.columns)
    const values = name ? getColumn(table, name) : undefined
    if (values === undefined) continue
    parts.push({ weight: component.weight, z: zScoreNormalize(transformColumn(values, component)) })
  }

  if (parts.length === 0) return null

  return table.dates.map((_, i) => {
    let sum = 0
    let any = false
    for (const { weight, z } of parts) {
      const v = z[i]
      if (!isValid(v)) continue
      sum += weight * v
      any = true
    }
    return any ? sum : null
  })
}

/**
 * Right-inclusive bands: (-inf, c0], (c0, c1], (c1, c2], (c2, c3], (c3, inf)
 */
export function compositeBand(value: number, cuts: CompositeConfig['bandCuts'] = DEFAULT_CONFIG.composite.bandCuts): CompositeBand {
  const index = cuts.findIndex((cut) => value <= cut)
  return BANDS[index === -1 ? BANDS.length - 1 : index]
}

export function buildCompositeIndex(
  table: AlignedTable,
  config: CompositeConfig = DEFAULT_CONFIG.composite
): CompositeIndexRecord[] {
  const subIndices: Record<string, Column | null> = {}
  for (const [id, components] of Object.entries(config.subIndices)) {
    subIndices[id] = buildSubIndex(table, components)
  }

  const composite = table.dates.map((_, i) =>
    Object.entries(config.weights).reduce((sum, [id, weight]) => {
      const v = subIndices[id]?.[i]
      return sum + weight * (isValid(v) ? v : 0)
    }, 0)
  )

  const fast = rollingMean(composite, config.fastWindow)
  const slow = rollingMean(composite, config.slowWindow)

  return table.dates.map((date, i) => ({
    date,
    subIndices: Object.fromEntries(Object.entries(subIndices).map(([id, values]) => [id, values?.[i] ?? null])),
    composite: composite[i],
    compositeFast: fast[i],
    compositeSlow: slow[i],
    band: compositeBand(composite[i], config.bandCuts),
  }))
}
