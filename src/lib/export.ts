import type { SeasonYearAggregate, SightingRecord, SmoothedTrendPoint, TrendPoint } from './types'

/** Column order downstream reports depend on. */
export const AGGREGATE_COLUMNS = ['year', 'spring', 'breeding', 'fall', 'winter', 'all'] as const

function csvEscape(value: string): string {
  return `"${value.replace(/"/g, '""')}"`
}

export function toAggregateTable(rows: readonly SeasonYearAggregate[]): {
  columns: typeof AGGREGATE_COLUMNS
  rows: number[][]
} {
  return {
    columns: AGGREGATE_COLUMNS,
    rows: rows.map(row => AGGREGATE_COLUMNS.map(column => row[column])),
  }
}

export function exportAggregatesToCSV(rows: readonly SeasonYearAggregate[], includeHeader = true): string {
  const table = toAggregateTable(rows)
  return [
    ...(includeHeader ? [table.columns.join(',')] : []),
    ...table.rows.map(row => row.join(',')),
  ].join('\n')
}

export function exportRecordsToCSV(records: readonly SightingRecord[]): string {
  const headers = ['Species Code', 'Species Name', 'Count', 'Observed Date']
  const rows = records.map(record => [
    record.speciesCode,
    record.speciesName,
    String(record.count),
    record.observedDate,
  ])

  return [headers.map(csvEscape).join(','), ...rows.map(row => row.map(csvEscape).join(','))].join('\n')
}

function isSmoothed(point: TrendPoint | SmoothedTrendPoint): point is SmoothedTrendPoint {
  return 'fitted' in point
}

/** True when every point carries a fitted value; mixed series print without the column. */
export function hasFittedValues(
  points: readonly (TrendPoint | SmoothedTrendPoint)[]
): points is readonly SmoothedTrendPoint[] {
  return points.length > 0 && points.every(isSmoothed)
}

export function exportTrendToCSV(points: readonly (TrendPoint | SmoothedTrendPoint)[]): string {
  const withFit = hasFittedValues(points)
  const header = withFit ? 'year,season,totalCount,fitted' : 'year,season,totalCount'
  const rows = points.map(point => {
    const cells = [String(point.year), point.season, String(point.totalCount)]
    if (withFit && isSmoothed(point)) cells.push(point.fitted.toFixed(3))
    return cells.join(',')
  })
  return [header, ...rows].join('\n')
}
