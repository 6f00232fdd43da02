/**
 * Extract sighting records from an eBird region page (the species listing
 * served at /region/<code>?yr=all&rank=lrec).
 *
 * The page layout is described by a schema of CSS selectors. Any node the
 * schema requires that is missing raises a single ParseError, so a layout
 * change on the site fails loudly instead of producing an empty table.
 */
import { JSDOM } from 'jsdom'
import { normalizeCount } from './count'
import { parseObservedDate } from './dates'
import { ParseError } from './errors'
import type { SightingRecord } from './types'

export interface RegionPageSchema {
  table: string
  /** Rows carrying a sighting (the site tags them with "has-details"). */
  detailRows: string
  /** Relative to a row. Rows without it are taxa with no canonical name. */
  speciesNameCell: string
  /** Relative to the name cell. */
  speciesAnchor: string
  speciesCodeAttribute: string
  countCell: string
  dateCell: string
}

export const REGION_PAGE_SCHEMA: RegionPageSchema = {
  table: 'table',
  detailRows: 'tr.has-details',
  speciesNameCell: 'td.species-name',
  speciesAnchor: 'a',
  speciesCodeAttribute: 'data-species-code',
  countCell: 'td.obs-count',
  dateCell: 'td.obs-date',
}

export interface ExtractionResult {
  records: SightingRecord[]
  skipped: {
    /** Detail rows with no species name cell. */
    unnamed: number
    /** Rows whose date could not be read. */
    undated: number
  }
}

function cellText(element: Element): string {
  return (element.textContent ?? '').replace(/\s+/g, ' ').trim()
}

function requireChild(row: Element, selector: string, label: string, rowIndex: number): Element {
  const child = row.querySelector(selector)
  if (!child) {
    throw new ParseError(`Sightings row ${rowIndex + 1} has no ${label} (expected "${selector}")`)
  }
  return child
}

/** Code from the anchor attribute, falling back to a /species/<code> link. */
function speciesCodeFrom(anchor: Element, schema: RegionPageSchema, rowIndex: number): string {
  const attribute = anchor.getAttribute(schema.speciesCodeAttribute)?.trim()
  if (attribute) return attribute

  const fromHref = anchor.getAttribute('href')?.match(/\/species\/([^/?#]+)/)?.[1]
  if (fromHref) return decodeURIComponent(fromHref)

  throw new ParseError(
    `Sightings row ${rowIndex + 1} has no species code (expected "${schema.speciesCodeAttribute}" or a /species/ link)`
  )
}

export function extractSightingsWithStats(
  markup: string,
  schema: RegionPageSchema = REGION_PAGE_SCHEMA
): ExtractionResult {
  const dom = new JSDOM(markup)
  try {
    const { document } = dom.window
    const tables = Array.from(document.querySelectorAll(schema.table))
    if (tables.length === 0) {
      throw new ParseError(`No sightings table found (expected "${schema.table}")`)
    }

    // Layout and summary tables can precede the listing
    const table = tables.find(candidate => candidate.querySelector(schema.detailRows) !== null)
    if (!table) {
      throw new ParseError(`Sightings table has no detail rows (expected "${schema.detailRows}")`)
    }
    const rows = Array.from(table.querySelectorAll(schema.detailRows))

    const records: SightingRecord[] = []
    let unnamed = 0
    let undated = 0

    rows.forEach((row, rowIndex) => {
      const nameCell = row.querySelector(schema.speciesNameCell)
      if (!nameCell) {
        unnamed++
        return
      }

      const anchor = requireChild(nameCell, schema.speciesAnchor, 'species link', rowIndex)
      const countCell = requireChild(row, schema.countCell, 'count cell', rowIndex)
      const dateCell = requireChild(row, schema.dateCell, 'date cell', rowIndex)

      const speciesName = cellText(anchor)
      if (!speciesName) {
        throw new ParseError(`Sightings row ${rowIndex + 1} has an empty species name`)
      }

      const count = normalizeCount(cellText(countCell))
      const observedDate = parseObservedDate(cellText(dateCell))
      if (!observedDate) {
        undated++
        return
      }

      records.push({
        speciesCode: speciesCodeFrom(anchor, schema, rowIndex),
        speciesName,
        count,
        observedDate,
      })
    })

    return { records, skipped: { unnamed, undated } }
  } finally {
    dom.window.close()
  }
}

export function extractSightings(markup: string, schema: RegionPageSchema = REGION_PAGE_SCHEMA): SightingRecord[] {
  return extractSightingsWithStats(markup, schema).records
}
