/**
 * Aligned-table access and declarative derived-metric transforms.
 *
 * A transform names the columns it cannot run without (`required`) and the
 * ones it uses when present (`optional`). The accessor handed to `compute`
 * only accepts those names, so a transform cannot silently read a column it
 * never declared.
 */

import { isValid } from './rolling'
import type { AlignedTable, Column, DerivationReport, Units } from './types'

// ============================================================================
// Column Access
// ============================================================================

export function getColumn(table: AlignedTable, name: string): Column | undefined {
  return Object.hasOwn(table.columns, name) ? table.columns[name] : undefined
}

export function hasValues(column: Column | undefined): column is Column {
  return column !== undefined && column.some(isValid)
}

/**
 * A column is usable when it exists and holds at least one valid value;
 * all-null placeholders count as absent.
 */
export function isPresent(table: AlignedTable, name: string): boolean {
  return hasValues(getColumn(table, name))
}

/** First name in `candidates` that is present in the table */
export function firstPresent(table: AlignedTable, candidates: readonly string[]): string | null {
  return candidates.find((name) => isPresent(table, name)) ?? null
}

export function setColumn(table: AlignedTable, name: string, values: Column, units: Units): void {
  table.columns[name] = values
  table.units[name] = units
}

export function nullColumn(length: number): Column {
  return Array.from({ length }, () => null)
}

export function mapColumn(values: Column, fn: (v: number) => number): Column {
  return values.map((v) => (isValid(v) ? fn(v) : null))
}

/** Element-wise combination; a missing value on either side yields null */
export function combineColumns(a: Column, b: Column, fn: (x: number, y: number) => number): Column {
  return a.map((x, i) => {
    const y = b[i]
    return isValid(x) && isValid(y) ? fn(x, y) : null
  })
}

export function lastValue(values: Column): number | null {
  const v = values[values.length - 1]
  return isValid(v) ? v : null
}

// ============================================================================
// Transforms
// ============================================================================

export interface TransformInputs<R extends string, O extends string> {
  required(name: R): Column
  optional(name: O): Column | undefined
}

export interface Transform<R extends string, O extends string, P extends string> {
  id: string
  required: readonly R[]
  optional: readonly O[]
  /** Output column -> units */
  outputs: Record<P, Units>
  compute(inputs: TransformInputs<R, O>, table: AlignedTable): Record<P, Column>
}

export interface TransformDefinition<R extends string, O extends string, P extends string> {
  id: string
  required: readonly R[]
  optional?: readonly O[]
  outputs: Record<P, Units>
  compute(inputs: TransformInputs<R, O>, table: AlignedTable): Record<P, Column>
}

export function defineTransform<R extends string, P extends string, O extends string = never>(
  transform: TransformDefinition<R, O, P>
): Transform<R, O, P> {
  return { ...transform, optional: transform.optional ?? [] }
}

/**
 * Run a transform against the table. When any required input is absent the
 * transform is skipped and recorded under `report.omitted`.
 */
export function applyTransform<R extends string, O extends string, P extends string>(
  table: AlignedTable,
  transform: Transform<R, O, P>,
  report: Pick<DerivationReport, 'applied' | 'omitted'>
): boolean {
  const missing = transform.required.filter((name) => !isPresent(table, name))
  if (missing.length > 0) {
    report.omitted.push({ id: transform.id, missing: [...missing] })
    return false
  }

  const inputs: TransformInputs<R, O> = {
    required: (name) => getColumn(table, name) ?? nullColumn(table.dates.length),
    optional: (name) => {
      const column = getColumn(table, name)
      return hasValues(column) ? column : undefined
    },
  }

  const outputs = transform.compute(inputs, table)
  for (const name of Object.keys(transform.outputs)) {
    if (!isOutputName(transform, name)) continue
    setColumn(table, name, outputs[name], transform.outputs[name])
  }

  report.applied.push(transform.id)
  return true
}

function isOutputName<P extends string>(transform: { outputs: Record<P, Units> }, name: string): name is P {
  return Object.hasOwn(transform.outputs, name)
}
