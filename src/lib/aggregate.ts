import { InvalidArgumentError } from './errors'
import { classifyDate, isWithinRange, seasonDateRange } from './seasons'
import type { Season, SeasonYearAggregate, SightingRecord } from './types'

/** Total count of records inside one season-year bucket. */
export function sumSeasonYear(records: readonly SightingRecord[], season: Season, year: number): number {
  const range = seasonDateRange(season, year)
  let total = 0
  for (const record of records) {
    if (isWithinRange(record.observedDate, range)) total += record.count
  }
  return total
}

/**
 * One row per year in [startYear, endYear], each season summed on its own.
 * A record lands in its named season and again in "all"; the all column is
 * a whole-year total, not a check on the other four.
 */
export function aggregateSeasons(
  records: readonly SightingRecord[],
  startYear: number,
  endYear: number
): SeasonYearAggregate[] {
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    throw new InvalidArgumentError(`Year range must be integers, got ${startYear}-${endYear}`)
  }
  if (startYear > endYear) {
    throw new InvalidArgumentError(`Start year ${startYear} is after end year ${endYear}`)
  }

  const rows: SeasonYearAggregate[] = []
  for (let year = startYear; year <= endYear; year++) {
    rows.push({
      year,
      spring: sumSeasonYear(records, 'spring', year),
      breeding: sumSeasonYear(records, 'breeding', year),
      fall: sumSeasonYear(records, 'fall', year),
      winter: sumSeasonYear(records, 'winter', year),
      all: sumSeasonYear(records, 'all', year),
    })
  }
  return rows
}

/** Smallest label-year span that covers every record, or null for no records. */
export function inferYearRange(records: readonly SightingRecord[]): { startYear: number; endYear: number } | null {
  let startYear = Number.POSITIVE_INFINITY
  let endYear = Number.NEGATIVE_INFINITY

  for (const record of records) {
    for (const bucket of classifyDate(record.observedDate)) {
      startYear = Math.min(startYear, bucket.year)
      endYear = Math.max(endYear, bucket.year)
    }
  }

  return Number.isFinite(startYear) ? { startYear, endYear } : null
}
