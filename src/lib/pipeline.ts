import { aggregateSeasons, inferYearRange } from './aggregate'
import { buildRegionUrl, type PageFetcher } from './fetcher'
import { extractSightingsWithStats, type RegionPageSchema } from './region-page'
import { EARLIEST_YEAR } from './seasons'
import { buildTrendSeries } from './trend'
import type { SeasonYearAggregate, SightingRecord, TrendPoint } from './types'

export type PipelineLogger = Pick<Console, 'info' | 'warn'>

export interface AnalyzeRegionOptions {
  fetchPage: PageFetcher
  baseUrl: string
  startYear?: number
  endYear?: number
  schema?: RegionPageSchema
  logger?: PipelineLogger
}

export interface RegionAnalysis {
  region: string
  url: string
  records: SightingRecord[]
  aggregates: SeasonYearAggregate[]
  trend: TrendPoint[]
}

/**
 * Fetch a region page and turn it into season totals per year.
 * Without an explicit range, the years covered by the records are used.
 */
export async function analyzeRegion(region: string, options: AnalyzeRegionOptions): Promise<RegionAnalysis> {
  const logger = options.logger ?? console
  const url = buildRegionUrl(region, options.baseUrl)

  logger.info(`[pipeline] Fetching ${url}`)
  const markup = await options.fetchPage(url)

  const { records, skipped } = extractSightingsWithStats(markup, options.schema)
  logger.info(`[pipeline] Extracted ${records.length} sightings for ${region}`)
  if (skipped.unnamed > 0) {
    logger.warn(`[pipeline] Skipped ${skipped.unnamed} rows without a species name`)
  }
  if (skipped.undated > 0) {
    logger.warn(`[pipeline] Skipped ${skipped.undated} rows without a readable date`)
  }

  const inferred = inferYearRange(records)
  let { startYear, endYear } = options

  if (startYear === undefined || endYear === undefined) {
    if (!inferred) {
      logger.warn(
        records.length === 0
          ? `[pipeline] No dated sightings for ${region}; nothing to aggregate`
          : `[pipeline] All ${records.length} sightings for ${region} fall before the ${EARLIEST_YEAR} season year; nothing to aggregate`
      )
      return { region, url, records, aggregates: [], trend: [] }
    }

    // A single given bound is kept; the other stretches to cover the data on that side
    if (startYear === undefined) {
      startYear = endYear === undefined ? inferred.startYear : Math.min(inferred.startYear, endYear)
    }
    if (endYear === undefined) endYear = Math.max(inferred.endYear, startYear)

    if (startYear > inferred.endYear || endYear < inferred.startYear) {
      logger.warn(
        `[pipeline] Years ${startYear}-${endYear} hold no sightings for ${region} (data covers ${inferred.startYear}-${inferred.endYear})`
      )
    }
  }

  const aggregates = aggregateSeasons(records, startYear, endYear)
  return { region, url, records, aggregates, trend: buildTrendSeries(aggregates) }
}
