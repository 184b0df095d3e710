import { vi } from 'vitest'
import { shiftDays } from '../dates'
import type { AlignedTable, Column, RawSeries, SeriesFrequency, Units } from '../types'

export function calendarDates(start: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => shiftDays(start, i))
}

export function makeTable(dates: readonly string[], columns: Record<string, Column>, units: Record<string, Units> = {}): AlignedTable {
  const table: AlignedTable = { dates: [...dates], columns: {}, units: {} }
  for (const [name, values] of Object.entries(columns)) {
    table.columns[name] = [...values]
    table.units[name] = units[name] ?? 'millions'
  }
  return table
}

export function rawSeries(
  id: string,
  frequency: SeriesFrequency,
  units: Units,
  points: [string, number][]
): RawSeries {
  return { id, frequency, units, observations: points.map(([date, value]) => ({ date, value })) }
}

export function constant(value: number, length: number): Column {
  return Array.from({ length }, () => value)
}

export function ramp(start: number, step: number, length: number): Column {
  return Array.from({ length }, (_, i) => start + step * i)
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
}
