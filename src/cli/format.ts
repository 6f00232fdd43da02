/** Plain-text table with right-aligned numeric columns. */
export function renderTable(columns: readonly string[], rows: readonly (readonly (string | number)[])[]): string {
  const cells = rows.map(row => row.map(cell => (typeof cell === 'number' ? String(cell) : cell)))
  const widths = columns.map((column, index) =>
    Math.max(column.length, ...cells.map(row => (row[index] ?? '').length))
  )
  const numeric = columns.map((_, index) => rows.length > 0 && rows.every(row => typeof row[index] === 'number'))

  const line = (values: readonly string[]) =>
    values
      .map((value, index) => (numeric[index] ? value.padStart(widths[index]) : value.padEnd(widths[index])))
      .join('  ')
      .trimEnd()

  return [line(columns), line(widths.map(width => '-'.repeat(width))), ...cells.map(line)].join('\n')
}
