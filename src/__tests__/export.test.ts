import { describe, it, expect } from 'vitest'
import {
  AGGREGATE_COLUMNS,
  exportAggregatesToCSV,
  exportRecordsToCSV,
  exportTrendToCSV,
  hasFittedValues,
  toAggregateTable,
} from '@/lib/export'
import { buildTrendSeries, smoothTrendSeries } from '@/lib/trend'
import type { SeasonYearAggregate } from '@/lib/types'

const ROWS: SeasonYearAggregate[] = [
  { year: 2005, spring: 1, breeding: 0, fall: 0, winter: 7, all: 8 },
  { year: 2006, spring: 4, breeding: 2, fall: 9, winter: 0, all: 15 },
]

describe('aggregate table export', () => {
  it('uses the fixed column order', () => {
    expect(AGGREGATE_COLUMNS).toEqual(['year', 'spring', 'breeding', 'fall', 'winter', 'all'])
  })

  it('lays rows out in column order', () => {
    expect(toAggregateTable(ROWS)).toEqual({
      columns: AGGREGATE_COLUMNS,
      rows: [
        [2005, 1, 0, 0, 7, 8],
        [2006, 4, 2, 9, 0, 15],
      ],
    })
  })

  it('writes CSV with a header', () => {
    expect(exportAggregatesToCSV(ROWS)).toBe(
      ['year,spring,breeding,fall,winter,all', '2005,1,0,0,7,8', '2006,4,2,9,0,15'].join('\n')
    )
  })

  it('can omit the header', () => {
    expect(exportAggregatesToCSV(ROWS.slice(0, 1), false)).toBe('2005,1,0,0,7,8')
  })
})

describe('exportRecordsToCSV', () => {
  it('quotes every cell and escapes embedded quotes', () => {
    const csv = exportRecordsToCSV([
      { speciesCode: 'x00001', speciesName: 'Gull, "hybrid"', count: 2, observedDate: '2005-01-01' },
    ])
    expect(csv).toBe(
      '"Species Code","Species Name","Count","Observed Date"\n"x00001","Gull, ""hybrid""","2","2005-01-01"'
    )
  })
})

describe('exportTrendToCSV', () => {
  it('writes long-form points', () => {
    const csv = exportTrendToCSV(buildTrendSeries(ROWS.slice(0, 1)))
    expect(csv.split('\n')).toEqual([
      'year,season,totalCount',
      '2005,spring,1',
      '2005,breeding,0',
      '2005,fall,0',
      '2005,winter,7',
      '2005,all,8',
    ])
  })

  it('adds the fitted column for smoothed points', () => {
    const smoothed = smoothTrendSeries(buildTrendSeries(ROWS.slice(0, 1)), 'lm')
    expect(exportTrendToCSV(smoothed).split('\n').slice(0, 2)).toEqual([
      'year,season,totalCount,fitted',
      '2005,spring,1,1.000',
    ])
  })

  it('drops the fitted column when only some points are smoothed', () => {
    const plain = buildTrendSeries(ROWS.slice(1))
    const mixed = [...smoothTrendSeries(buildTrendSeries(ROWS.slice(0, 1)), 'lm'), ...plain]

    expect(hasFittedValues(mixed)).toBe(false)
    const lines = exportTrendToCSV(mixed).split('\n')
    expect(lines[0]).toBe('year,season,totalCount')
    expect(lines[1]).toBe('2005,spring,1')
    expect(lines[6]).toBe('2006,spring,4')
  })

  it('treats an empty series as unsmoothed', () => {
    expect(hasFittedValues([])).toBe(false)
    expect(exportTrendToCSV([])).toBe('year,season,totalCount')
  })
})
