import { InvalidArgumentError } from './errors'
import { SEASONS } from './seasons'
import type { Season, SeasonYearAggregate, SmoothedTrendPoint, SmoothingMethod, TrendPoint } from './types'

/** Below this many points per series, "auto" picks local regression. */
export const LOESS_MAX_POINTS = 1000
export const DEFAULT_SPAN = 0.75

const SMOOTHING_METHODS: readonly SmoothingMethod[] = ['auto', 'loess', 'lm']

export function isSmoothingMethod(value: string): value is SmoothingMethod {
  return SMOOTHING_METHODS.some(method => method === value)
}

/** Wide aggregate rows to long form: one point per (row, season), seasons in canonical order. */
export function buildTrendSeries(rows: readonly SeasonYearAggregate[]): TrendPoint[] {
  return rows.flatMap(row =>
    SEASONS.map(season => ({ year: row.year, season, totalCount: row[season] }))
  )
}

function weightedLinearFit(xs: number[], ys: number[], weights: number[], x0: number): number {
  let sumW = 0
  let sumX = 0
  let sumY = 0
  for (let i = 0; i < xs.length; i++) {
    sumW += weights[i]
    sumX += weights[i] * xs[i]
    sumY += weights[i] * ys[i]
  }
  if (sumW === 0) return Number.NaN

  const meanX = sumX / sumW
  const meanY = sumY / sumW
  let sxx = 0
  let sxy = 0
  for (let i = 0; i < xs.length; i++) {
    sxx += weights[i] * (xs[i] - meanX) ** 2
    sxy += weights[i] * (xs[i] - meanX) * (ys[i] - meanY)
  }
  // A single distinct x carries no slope
  if (sxx < 1e-12) return meanY

  return meanY + (sxy / sxx) * (x0 - meanX)
}

function tricube(u: number): number {
  return u < 1 ? (1 - u ** 3) ** 3 : 0
}

function loessFit(xs: number[], ys: number[], span: number): number[] {
  const n = xs.length
  const q = Math.min(n, Math.max(1, Math.floor(span * n)))

  return xs.map(x0 => {
    const distances = xs.map(x => Math.abs(x - x0))
    let bandwidth = [...distances].sort((a, b) => a - b)[q - 1]
    if (span > 1) bandwidth *= span

    const weights = distances.map(d => (bandwidth === 0 ? (d === 0 ? 1 : 0) : tricube(d / bandwidth)))
    return weightedLinearFit(xs, ys, weights, x0)
  })
}

function lmFit(xs: number[], ys: number[]): number[] {
  const weights = xs.map(() => 1)
  return xs.map(x0 => weightedLinearFit(xs, ys, weights, x0))
}

/**
 * Attach a fitted value to every point, fitting each season's series
 * separately against year. Output keeps the input order.
 */
export function smoothTrendSeries(
  points: readonly TrendPoint[],
  method: SmoothingMethod = 'auto',
  span = DEFAULT_SPAN
): SmoothedTrendPoint[] {
  if (!isSmoothingMethod(method)) {
    throw new InvalidArgumentError(`Unknown smoothing method "${method}"`)
  }
  if (!(span > 0)) {
    throw new InvalidArgumentError(`Smoothing span must be positive, got ${span}`)
  }

  const groups = new Map<Season, number[]>()
  points.forEach((point, index) => {
    const existing = groups.get(point.season)
    if (existing) existing.push(index)
    else groups.set(point.season, [index])
  })

  const fitted = new Array<number>(points.length)
  for (const indices of groups.values()) {
    const xs = indices.map(index => points[index].year)
    const ys = indices.map(index => points[index].totalCount)
    const useLoess = method === 'loess' || (method === 'auto' && indices.length < LOESS_MAX_POINTS)
    const values = useLoess ? loessFit(xs, ys, span) : lmFit(xs, ys)
    indices.forEach((pointIndex, i) => {
      fitted[pointIndex] = values[i]
    })
  }

  return points.map((point, index) => ({ ...point, fitted: fitted[index] }))
}
