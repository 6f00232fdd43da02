import { calendarDateParts, toCalendarDate } from './dates'
import { InvalidArgumentError } from './errors'
import type { CalendarDate, DateRange, Season, SeasonWindow, SeasonYearBucket } from './types'

/** Canonical order, used for trend series and table columns. */
export const SEASONS = ['spring', 'breeding', 'fall', 'winter', 'all'] as const satisfies readonly Season[]

/** Seasons that partition the Mar-Feb migration year. */
export const NAMED_SEASONS = ['spring', 'breeding', 'fall', 'winter'] as const satisfies readonly Season[]

export const EARLIEST_YEAR = 1970

export const SEASON_WINDOWS: Record<Season, SeasonWindow> = {
  spring: { startMonth: 3, endMonth: 6, crossesYearBoundary: false },
  breeding: { startMonth: 6, endMonth: 8, crossesYearBoundary: false },
  fall: { startMonth: 8, endMonth: 12, crossesYearBoundary: false },
  winter: { startMonth: 12, endMonth: 3, crossesYearBoundary: true },
  all: { startMonth: 3, endMonth: 3, crossesYearBoundary: true },
}

export function isSeason(value: string): value is Season {
  return SEASONS.some(season => season === value)
}

function assertLabelYear(year: number): void {
  if (!Number.isInteger(year) || year < EARLIEST_YEAR) {
    throw new InvalidArgumentError(`Year must be an integer >= ${EARLIEST_YEAR}, got ${year}`)
  }
}

/**
 * Date range covered by a season in a labelled year. Winter and the
 * all-year bucket run into the following calendar year, so winter 1999 is
 * [1999-12-01, 2000-03-01).
 */
export function seasonDateRange(season: string, year: number): DateRange {
  if (!isSeason(season)) {
    throw new InvalidArgumentError(`Unknown season "${season}" (expected one of ${SEASONS.join(', ')})`)
  }
  assertLabelYear(year)

  const window = SEASON_WINDOWS[season]
  const endYear = window.crossesYearBoundary ? year + 1 : year
  const start = toCalendarDate(year, window.startMonth, 1)
  const end = toCalendarDate(endYear, window.endMonth, 1)
  if (!start || !end) {
    throw new InvalidArgumentError(`Year ${year} is outside the supported calendar`)
  }

  return { start, end }
}

export function isWithinRange(date: CalendarDate, range: DateRange): boolean {
  return date >= range.start && date < range.end
}

function seasonForMonth(month: number): Season {
  const season = NAMED_SEASONS.find(name => {
    const { startMonth, endMonth, crossesYearBoundary } = SEASON_WINDOWS[name]
    return crossesYearBoundary
      ? month >= startMonth || month < endMonth
      : month >= startMonth && month < endMonth
  })
  // The named seasons cover all twelve months
  return season ?? 'winter'
}

function labelYear(season: Season, year: number, month: number): number {
  const window = SEASON_WINDOWS[season]
  return window.crossesYearBoundary && month < window.endMonth ? year - 1 : year
}

/**
 * Buckets a date belongs to: its named season and the all-year bucket.
 * Buckets labelled before 1970 are left out.
 */
export function classifyDate(date: CalendarDate): SeasonYearBucket[] {
  const parts = calendarDateParts(date)
  if (!parts) throw new InvalidArgumentError(`Invalid calendar date "${date}"`)

  const season = seasonForMonth(parts.month)
  const buckets: SeasonYearBucket[] = [
    { season, year: labelYear(season, parts.year, parts.month) },
    { season: 'all', year: labelYear('all', parts.year, parts.month) },
  ]
  return buckets.filter(bucket => bucket.year >= EARLIEST_YEAR)
}
