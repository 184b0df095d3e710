import { addDays, differenceInCalendarDays, format, parseISO, startOfMonth, startOfWeek } from 'date-fns'

/**
 * Calendar helpers over ISO date strings (YYYY-MM-DD)
 */

export function toIsoDate(d: Date): string {
  return format(d, 'yyyy-MM-dd')
}

export function daysBetween(start: string, end: string): number {
  return differenceInCalendarDays(parseISO(end), parseISO(start))
}

export function shiftDays(iso: string, days: number): string {
  return toIsoDate(addDays(parseISO(iso), days))
}

export function monthStart(iso: string): string {
  return toIsoDate(startOfMonth(parseISO(iso)))
}

/**
 * First day of the three-month block containing `iso`. Blocks are counted from
 * `fiscalYearStartMonth` (1 = January gives calendar quarters).
 */
export function quarterStart(iso: string, fiscalYearStartMonth: number = 1): string {
  const d = parseISO(iso)
  const offset = (d.getMonth() - (fiscalYearStartMonth - 1) + 12) % 12
  return toIsoDate(new Date(d.getFullYear(), d.getMonth() - (offset % 3), 1))
}

export function fiscalYearStart(iso: string, fiscalYearStartMonth: number): string {
  const d = parseISO(iso)
  const startMonth = fiscalYearStartMonth - 1
  const year = d.getMonth() >= startMonth ? d.getFullYear() : d.getFullYear() - 1
  return toIsoDate(new Date(year, startMonth, 1))
}

/** Monday of the week containing `iso` */
export function weekStart(iso: string): string {
  return toIsoDate(startOfWeek(parseISO(iso), { weekStartsOn: 1 }))
}

/** Date part of a date or timestamp string */
export function datePart(value: string): string {
  return value.slice(0, 10)
}
