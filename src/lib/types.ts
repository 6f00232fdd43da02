/** ISO calendar date, e.g. "2005-03-15". String order is chronological order. */
export type CalendarDate = string

export interface SightingRecord {
  readonly speciesCode: string
  readonly speciesName: string
  readonly count: number
  readonly observedDate: CalendarDate
}

export type Season = 'spring' | 'breeding' | 'fall' | 'winter' | 'all'

export interface SeasonWindow {
  startMonth: number
  /** Exclusive. */
  endMonth: number
  crossesYearBoundary: boolean
}

export interface SeasonYearBucket {
  season: Season
  /** Year the season starts in. */
  year: number
}

/** Half-open range: start <= date < end */
export interface DateRange {
  start: CalendarDate
  end: CalendarDate
}

export type SeasonYearAggregate = {
  year: number
} & Record<Season, number>

export interface TrendPoint {
  year: number
  season: Season
  totalCount: number
}

export interface SmoothedTrendPoint extends TrendPoint {
  fitted: number
}

export type SmoothingMethod = 'auto' | 'loess' | 'lm'
