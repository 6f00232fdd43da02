import { readFile } from 'node:fs/promises'
import { FetchError, InvalidArgumentError } from './errors'

/** Region URL in, raw markup out. Rejects with FetchError. */
export type PageFetcher = (url: string) => Promise<string>

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Region page listing every year, ranked by most recent checklist. */
export function buildRegionUrl(region: string, baseUrl: string): string {
  const trimmed = region.trim()
  if (!trimmed) throw new InvalidArgumentError('Region code is required')

  return `${baseUrl.replace(/\/+$/, '')}/region/${encodeURIComponent(trimmed)}?yr=all&m=&rank=lrec`
}

export interface HttpFetcherOptions {
  userAgent: string
  timeoutMs: number
}

export function createHttpPageFetcher({ userAgent, timeoutMs }: HttpFetcherOptions): PageFetcher {
  return async url => {
    let res: Response
    try {
      res = await fetch(url, {
        headers: { 'User-Agent': userAgent, Accept: 'text/html' },
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      throw new FetchError(url, `Request for ${url} failed: ${errorMessage(error)}`, { cause: error })
    }

    if (!res.ok) {
      throw new FetchError(url, `Region page ${res.status} for ${url}`, { status: res.status })
    }

    try {
      return await res.text()
    } catch (error) {
      throw new FetchError(url, `Reading ${url} failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}

/** Serves one saved page regardless of the URL asked for. */
export function createFilePageFetcher(path: string): PageFetcher {
  return async url => {
    try {
      return await readFile(path, 'utf8')
    } catch (error) {
      throw new FetchError(url, `Could not read saved page ${path}: ${errorMessage(error)}`, { cause: error })
    }
  }
}
