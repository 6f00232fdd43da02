import { InvalidArgumentError } from './errors'
import { isSmoothingMethod } from './trend'
import type { SmoothingMethod } from './types'

export interface SightingsConfig {
  baseUrl: string
  userAgent: string
  timeoutMs: number
  smoothing: SmoothingMethod
}

export const DEFAULT_CONFIG: SightingsConfig = {
  baseUrl: 'https://ebird.org',
  userAgent: 'SightingTrends/1.0 (season trend analysis)',
  timeoutMs: 30_000,
  smoothing: 'auto',
}

type Env = Record<string, string | undefined>

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value)
  if (!value || !Number.isFinite(parsed) || parsed <= 0) return fallback
  return Math.floor(parsed)
}

export function loadConfig(env: Env = process.env): SightingsConfig {
  const smoothing = env.SIGHTINGS_SMOOTHING?.trim() || DEFAULT_CONFIG.smoothing
  if (!isSmoothingMethod(smoothing)) {
    throw new InvalidArgumentError(`SIGHTINGS_SMOOTHING must be auto, loess or lm, got "${smoothing}"`)
  }

  return {
    baseUrl: (env.SIGHTINGS_BASE_URL?.trim() || DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ''),
    userAgent: env.SIGHTINGS_USER_AGENT?.trim() || DEFAULT_CONFIG.userAgent,
    timeoutMs: parsePositiveInt(env.SIGHTINGS_FETCH_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    smoothing,
  }
}
