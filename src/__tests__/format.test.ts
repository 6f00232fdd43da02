import { describe, it, expect } from 'vitest'
import { renderTable } from '@/cli/format'

describe('renderTable', () => {
  it('left-aligns text and right-aligns numbers', () => {
    const table = renderTable(['name', 'count'], [
      ['Mallard', 3],
      ['Bald Eagle', 12],
    ])

    expect(table.split('\n')).toEqual([
      'name        count',
      '----------  -----',
      'Mallard         3',
      'Bald Eagle     12',
    ])
  })

  it('prints only the header for no rows', () => {
    expect(renderTable(['year', 'all'], [])).toBe('year  all\n----  ---')
  })
})
