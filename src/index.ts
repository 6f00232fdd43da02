export * from './lib/types'
export * from './lib/errors'
export { PRESENCE_MARKER, normalizeCount } from './lib/count'
export { parseObservedDate, toCalendarDate, isCalendarDate } from './lib/dates'
export {
  SEASONS,
  NAMED_SEASONS,
  SEASON_WINDOWS,
  EARLIEST_YEAR,
  isSeason,
  seasonDateRange,
  isWithinRange,
  classifyDate,
} from './lib/seasons'
export {
  REGION_PAGE_SCHEMA,
  extractSightings,
  extractSightingsWithStats,
  type RegionPageSchema,
  type ExtractionResult,
} from './lib/region-page'
export { aggregateSeasons, sumSeasonYear, inferYearRange } from './lib/aggregate'
export { buildTrendSeries, smoothTrendSeries, isSmoothingMethod, DEFAULT_SPAN, LOESS_MAX_POINTS } from './lib/trend'
export {
  AGGREGATE_COLUMNS,
  toAggregateTable,
  exportAggregatesToCSV,
  exportRecordsToCSV,
  exportTrendToCSV,
  hasFittedValues,
} from './lib/export'
export {
  buildRegionUrl,
  createHttpPageFetcher,
  createFilePageFetcher,
  type PageFetcher,
  type HttpFetcherOptions,
} from './lib/fetcher'
export { loadConfig, DEFAULT_CONFIG, type SightingsConfig } from './lib/config'
export { analyzeRegion, type AnalyzeRegionOptions, type RegionAnalysis, type PipelineLogger } from './lib/pipeline'
