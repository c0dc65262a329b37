/**
 * Resolves logical column names to the actual headers of a table
 * @module core/tables/column-resolver
 */

import type { Table } from '../../types/table.js'
import { MissingColumnError } from '../../utils/errors.js'

/**
 * Case- and space-insensitive fold used for header comparison
 */
export function foldColumnName(name: string): string {
  return name.toLowerCase().replace(/ /g, '')
}

/**
 * Finds the header matching `target` under the fold, or undefined.
 *
 * @example
 * ```typescript
 * tryFindColumn(table, 'Source_ID') // 'Source_ID', 'source_id', 'Source _ID', ...
 * ```
 */
export function tryFindColumn(table: Table, target: string): string | undefined {
  const folded = foldColumnName(target)
  return table.columns.find((column) => foldColumnName(column) === folded)
}

/**
 * Finds the header matching `target` under the fold.
 *
 * @throws {MissingColumnError} If no header matches
 */
export function findColumn(table: Table, target: string): string {
  const column = tryFindColumn(table, target)
  if (column === undefined) {
    throw new MissingColumnError(target, table.name)
  }
  return column
}

/**
 * Ensures an exact column exists, appending it with '' on every row when missing.
 *
 * @returns The column name
 */
export function ensureColumn(table: Table, column: string): string {
  if (!table.columns.includes(column)) {
    table.columns.push(column)
    for (const row of table.rows) {
      row[column] = ''
    }
  }
  return column
}
