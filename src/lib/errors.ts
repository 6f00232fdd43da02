export class SightingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The page could not be retrieved. Surfaced as-is; the core never retries. */
export class FetchError extends SightingsError {
  url: string
  status?: number

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.url = url
    this.status = options?.status
  }
}

/** The markup does not have the expected sightings table layout. */
export class ParseError extends SightingsError {}

export class InvalidCountError extends SightingsError {
  raw: string

  constructor(raw: string) {
    super(`Unrecognized count "${raw}"`)
    this.raw = raw
  }
}

export class InvalidArgumentError extends SightingsError {}
