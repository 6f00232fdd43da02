import type { CalendarDate } from './types'

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const

const pad = (value: number, width = 2) => String(value).padStart(width, '0')

/** Build a calendar date; returns null for impossible dates like Feb 30. */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) return null

  // Date.UTC rolls over out-of-range days, so compare the result back
  const candidate = new Date(Date.UTC(year, month - 1, day))
  if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) return null

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`
}

export function calendarDateParts(date: string): { year: number; month: number; day: number } | null {
  const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/)
  if (!match) return null

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  return toCalendarDate(year, month, day) ? { year, month, day } : null
}

export function isCalendarDate(value: string): value is CalendarDate {
  return calendarDateParts(value) !== null
}

function monthFromName(name: string): number | null {
  const index = MONTHS.findIndex(month => name.toLowerCase().startsWith(month))
  return index === -1 ? null : index + 1
}

/**
 * Parse the date shown in a sightings row.
 * Handles "15-Mar-2005", "15 Mar 2005", "Mar 15, 2005" and "2005-03-15".
 */
export function parseObservedDate(text: string): CalendarDate | null {
  const trimmed = text.trim().replace(/\s+/g, ' ')
  if (!trimmed) return null

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/)
  if (iso) return toCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))

  const dayFirst = trimmed.match(/^(\d{1,2})[- ]([A-Za-z]{3,9})\.?[- ](\d{4})$/)
  if (dayFirst) {
    const month = monthFromName(dayFirst[2])
    return month ? toCalendarDate(Number(dayFirst[3]), month, Number(dayFirst[1])) : null
  }

  const monthFirst = trimmed.match(/^([A-Za-z]{3,9})\.? (\d{1,2}),? (\d{4})$/)
  if (monthFirst) {
    const month = monthFromName(monthFirst[1])
    return month ? toCalendarDate(Number(monthFirst[3]), month, Number(monthFirst[2])) : null
  }

  return null
}
