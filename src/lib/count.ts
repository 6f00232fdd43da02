import { InvalidCountError } from './errors'

/** eBird convention: species present but not counted. */
export const PRESENCE_MARKER = 'X'

const PLAIN_COUNT = /^\d+$/
const GROUPED_COUNT = /^\d{1,3}(,\d{3})+$/

/**
 * Convert a count cell to a non-negative integer.
 * "X" means one or more were seen, so it becomes 1 (a lower bound).
 */
export function normalizeCount(raw: string): number {
  const trimmed = raw.trim()
  if (trimmed.toUpperCase() === PRESENCE_MARKER) return 1

  if (PLAIN_COUNT.test(trimmed) || GROUPED_COUNT.test(trimmed)) {
    const count = Number.parseInt(trimmed.replace(/,/g, ''), 10)
    if (Number.isSafeInteger(count)) return count
  }

  throw new InvalidCountError(raw)
}
