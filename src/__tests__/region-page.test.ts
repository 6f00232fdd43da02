import { describe, it, expect } from 'vitest'
import { InvalidCountError, ParseError } from '@/lib/errors'
import { extractSightings, extractSightingsWithStats, type RegionPageSchema } from '@/lib/region-page'
import { THREE_ROW_PAGE, regionPage, sightingRow, unnamedRow } from './fixtures/region-page'

describe('extractSightings', () => {
  it('keeps named rows and drops taxa without a name cell', () => {
    expect(extractSightings(THREE_ROW_PAGE)).toEqual([
      { speciesCode: 'speca', speciesName: 'Species A', count: 1, observedDate: '2005-03-15' },
      { speciesCode: 'specb', speciesName: 'Species B', count: 7, observedDate: '2006-01-10' },
    ])
  })

  it('reports how many rows were skipped', () => {
    const { skipped } = extractSightingsWithStats(THREE_ROW_PAGE)
    expect(skipped).toEqual({ unnamed: 1, undated: 0 })
  })

  it('drops rows whose date cannot be read rather than emitting a null date', () => {
    const page = regionPage([
      sightingRow({ code: 'mallar3', name: 'Mallard', count: '4', date: 'Date unknown' }),
      sightingRow({ code: 'gadwal', name: 'Gadwall', count: '2', date: '03-Apr-2010' }),
    ])

    const { records, skipped } = extractSightingsWithStats(page)
    expect(records).toEqual([
      { speciesCode: 'gadwal', speciesName: 'Gadwall', count: 2, observedDate: '2010-04-03' },
    ])
    expect(skipped.undated).toBe(1)
    expect(records.every(record => record.observedDate.length === 10)).toBe(true)
  })

  it('keeps duplicate entries', () => {
    const row = sightingRow({ code: 'amerob', name: 'American Robin', count: '3', date: '10-Apr-2004' })
    expect(extractSightings(regionPage([row, row]))).toHaveLength(2)
  })

  it('collapses whitespace in cell text', () => {
    const page = regionPage([
      sightingRow({ code: 'norcar', name: '\n  Northern\n    Cardinal  ', count: ' 2 ', date: ' 15 Mar 2005 ' }),
    ])
    expect(extractSightings(page)).toEqual([
      { speciesCode: 'norcar', speciesName: 'Northern Cardinal', count: 2, observedDate: '2005-03-15' },
    ])
  })

  it('recovers the species code from the link when the attribute is missing', () => {
    const page = regionPage([
      sightingRow({ name: 'Northern Cardinal', count: '1', date: '15-Mar-2005', href: '/species/norcar/US-WA' }),
    ])
    expect(extractSightings(page)[0].speciesCode).toBe('norcar')
  })

  it('fails when a named row has no species code at all', () => {
    const page = regionPage([sightingRow({ name: 'Mystery Bird', count: '1', date: '15-Mar-2005' })])
    expect(() => extractSightings(page)).toThrow(ParseError)
    expect(() => extractSightings(page)).toThrow('Sightings row 1 has no species code')
  })

  it('fails with ParseError when the table is missing', () => {
    expect(() => extractSightings('<html><body><p>Region not found</p></body></html>')).toThrow(ParseError)
    expect(() => extractSightings('')).toThrow('No sightings table found (expected "table")')
  })

  it('fails with ParseError when the table has no detail rows', () => {
    const page = '<table><tr><td>Nothing yet</td></tr></table>'
    expect(() => extractSightings(page)).toThrow('Sightings table has no detail rows (expected "tr.has-details")')
  })

  it('finds the sightings table after other tables on the page', () => {
    const listing = regionPage([
      sightingRow({ code: 'amerob', name: 'American Robin', count: '3', date: '10-Apr-2004' }),
    ])
    const page = listing.replace('<body>', '<body><table id="nav"><tr><td>Menu</td></tr></table>')

    expect(extractSightings(page)).toEqual([
      { speciesCode: 'amerob', speciesName: 'American Robin', count: 3, observedDate: '2004-04-10' },
    ])
  })

  it('fails with ParseError when a named row is missing a cell', () => {
    const page = regionPage([
      sightingRow({ code: 'amerob', name: 'American Robin', count: '3', date: '10-Apr-2004' }),
      `<tr class="has-details"><td class="species-name"><a data-species-code="baleag">Bald Eagle</a></td><td class="obs-date">01-May-2004</td></tr>`,
    ])
    expect(() => extractSightings(page)).toThrow('Sightings row 2 has no count cell (expected "td.obs-count")')
  })

  it('fails the whole extraction on an unrecognized count', () => {
    const page = regionPage([
      sightingRow({ code: 'amerob', name: 'American Robin', count: '3', date: '10-Apr-2004' }),
      sightingRow({ code: 'baleag', name: 'Bald Eagle', count: 'many', date: '01-May-2004' }),
    ])
    expect(() => extractSightings(page)).toThrow(InvalidCountError)
  })

  it('ignores unnamed rows even when their cells are unusual', () => {
    const page = regionPage([
      unnamedRow('lots', 'sometime'),
      sightingRow({ code: 'amerob', name: 'American Robin', count: '3', date: '10-Apr-2004' }),
    ])
    expect(extractSightings(page)).toHaveLength(1)
  })

  it('follows a custom schema', () => {
    const schema: RegionPageSchema = {
      table: '#obs',
      detailRows: 'tr.obs',
      speciesNameCell: '.name',
      speciesAnchor: 'span',
      speciesCodeAttribute: 'data-code',
      countCell: '.n',
      dateCell: '.when',
    }
    const page = `<table id="obs"><tr class="obs">
      <td class="name"><span data-code="rethaw">Red-tailed Hawk</span></td>
      <td class="n">X</td><td class="when">2012-10-05</td>
    </tr></table>`

    expect(extractSightings(page, schema)).toEqual([
      { speciesCode: 'rethaw', speciesName: 'Red-tailed Hawk', count: 1, observedDate: '2012-10-05' },
    ])
  })
})
