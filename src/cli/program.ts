import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander'
import { loadConfig } from '@/lib/config'
import { InvalidArgumentError } from '@/lib/errors'
import {
  exportAggregatesToCSV,
  exportRecordsToCSV,
  exportTrendToCSV,
  hasFittedValues,
  toAggregateTable,
} from '@/lib/export'
import { createFilePageFetcher, createHttpPageFetcher, type PageFetcher } from '@/lib/fetcher'
import { analyzeRegion, type PipelineLogger } from '@/lib/pipeline'
import { EARLIEST_YEAR } from '@/lib/seasons'
import { isSmoothingMethod, smoothTrendSeries } from '@/lib/trend'
import type { SmoothedTrendPoint, SmoothingMethod, TrendPoint } from '@/lib/types'
import { renderTable } from './format'

type OutputFormat = 'table' | 'csv' | 'json'

interface CliOptions {
  startYear?: number
  endYear?: number
  format: OutputFormat
  records?: boolean
  trend?: boolean
  smooth?: string | boolean
  input?: string
}

export interface CliDeps {
  fetchPage?: PageFetcher
  env?: Record<string, string | undefined>
  write?: (text: string) => void
  logger?: PipelineLogger
}

function parseYear(value: string): number {
  const year = Number(value)
  if (!/^\d{4}$/.test(value) || year < EARLIEST_YEAR) {
    throw new CommanderArgumentError(`Expected a year >= ${EARLIEST_YEAR}.`)
  }
  return year
}

function resolveSmoothing(flag: string | boolean | undefined, fallback: SmoothingMethod): SmoothingMethod | null {
  if (flag === undefined || flag === false) return null
  const method = typeof flag === 'string' ? flag : fallback
  if (!isSmoothingMethod(method)) {
    throw new InvalidArgumentError(`Unknown smoothing method "${method}" (expected auto, loess or lm).`)
  }
  return method
}

function renderTrend(points: readonly (TrendPoint | SmoothedTrendPoint)[], format: OutputFormat): string {
  if (format === 'json') return JSON.stringify(points, null, 2)
  if (format === 'csv') return exportTrendToCSV(points)

  if (hasFittedValues(points)) {
    return renderTable(
      ['year', 'season', 'totalCount', 'fitted'],
      points.map(point => [point.year, point.season, point.totalCount, Number(point.fitted.toFixed(3))])
    )
  }
  return renderTable(
    ['year', 'season', 'totalCount'],
    points.map(point => [point.year, point.season, point.totalCount])
  )
}

export function createProgram(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((text: string) => process.stdout.write(`${text}\n`))
  // Progress goes to stderr so stdout stays a clean table
  const logger: PipelineLogger = deps.logger ?? {
    info: (...data: unknown[]) => console.error(...data),
    warn: (...data: unknown[]) => console.warn(...data),
  }

  const program = new Command()

  program
    .name('sighting-trends')
    .description('Season-by-year sighting totals for an eBird region')
    .argument('<region>', 'eBird region code, e.g. US-CA-085')
    .option('--start-year <year>', 'first season year to aggregate', parseYear)
    .option('--end-year <year>', 'last season year to aggregate', parseYear)
    .addOption(new Option('--format <format>', 'output format').choices(['table', 'csv', 'json']).default('table'))
    .option('--records', 'print the extracted sighting records instead of season totals')
    .option('--trend', 'print the long-form trend series')
    .option('--smooth [method]', 'print the trend series with a fitted line (auto, loess or lm)')
    .option('--input <file>', 'read a saved region page instead of fetching it')
    .action(async (region: string, options: CliOptions) => {
      const config = loadConfig(deps.env ?? process.env)
      const smoothing = resolveSmoothing(options.smooth, config.smoothing)
      const fetchPage = options.input
        ? createFilePageFetcher(options.input)
        : deps.fetchPage ?? createHttpPageFetcher(config)

      const analysis = await analyzeRegion(region, {
        fetchPage,
        baseUrl: config.baseUrl,
        startYear: options.startYear,
        endYear: options.endYear,
        logger,
      })

      if (options.records) {
        if (options.format === 'json') write(JSON.stringify(analysis.records, null, 2))
        else if (options.format === 'csv') write(exportRecordsToCSV(analysis.records))
        else {
          write(renderTable(
            ['speciesCode', 'speciesName', 'count', 'observedDate'],
            analysis.records.map(record => [record.speciesCode, record.speciesName, record.count, record.observedDate])
          ))
        }
        return
      }

      if (smoothing) {
        write(renderTrend(smoothTrendSeries(analysis.trend, smoothing), options.format))
        return
      }

      if (options.trend) {
        write(renderTrend(analysis.trend, options.format))
        return
      }

      if (options.format === 'json') write(JSON.stringify(analysis.aggregates, null, 2))
      else if (options.format === 'csv') write(exportAggregatesToCSV(analysis.aggregates))
      else {
        const table = toAggregateTable(analysis.aggregates)
        write(renderTable(table.columns, table.rows))
      }
    })

  return program
}
