/**
 * Header normalization for extract tables
 * @module core/tables/header-normalizer
 */

import type { Row, Table } from '../../types/table.js'
import { columnLabel, defaultColumnLabel, uniqueColumnKey } from '../../types/table.js'

const NBSP = /\u00A0/g

/**
 * Normalizes a single header: non-breaking spaces become plain spaces and
 * the result is trimmed.
 *
 * @example
 * ```typescript
 * normalizeHeader(' NAME1 ') // 'NAME1'
 * ```
 */
export function normalizeHeader(header: string): string {
  return header.replace(NBSP, ' ').trim()
}

function sameLabels(
  a: Record<string, string> | undefined,
  b: Record<string, string> | undefined
): boolean {
  const left = Object.entries(a ?? {})
  return left.length === Object.keys(b ?? {}).length && left.every(([key, value]) => b?.[key] === value)
}

/**
 * Normalizes every header of a table in place, renaming the row keys to match.
 * Headers that collide after normalization get a `_<n>` key suffix while
 * their label keeps the normalized header text.
 * Returns the same table for chaining.
 */
export function normalizeHeaders(table: Table): Table {
  const taken = new Set<string>()
  const renames = table.columns.map((column) => ({
    from: column,
    to: uniqueColumnKey(normalizeHeader(column), taken),
    label: normalizeHeader(columnLabel(table, column)),
  }))

  const collected: Record<string, string> = {}
  for (const { to, label } of renames) {
    if (label !== defaultColumnLabel(to)) collected[to] = label
  }
  const labels = Object.keys(collected).length > 0 ? collected : undefined
  if (!sameLabels(table.labels, labels)) {
    table.labels = labels
  }

  if (renames.every(({ from, to }) => from === to)) {
    return table
  }

  table.columns = renames.map(({ to }) => to)
  table.rows = table.rows.map((row) => {
    const renamed: Row = {}
    for (const { from, to } of renames) {
      renamed[to] = row[from] ?? ''
    }
    return renamed
  })
  return table
}
