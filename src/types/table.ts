/**
 * A single data row. Every value is text; absent cells are the empty string.
 */
export type Row = Record<string, string>

/**
 * One sheet of the extract, read with its second physical row as header.
 * Row indexes are stable for the whole run and are what the mutation
 * ledger refers to.
 */
export interface Table {
  /** Sheet name the table was read from */
  name: string
  /** Ordered column keys, unique within the table */
  columns: string[]
  /** Data rows, in sheet order */
  rows: Row[]
  /**
   * Header text per column key, only where it differs from the key: blank
   * headers and repeated headers whose key carries a `_<n>` suffix
   */
  labels?: Record<string, string>
}

/**
 * A sheet as read from the workbook: the opaque first row plus the table below it.
 */
export interface Sheet {
  /** Cell texts of the first physical row, reproduced verbatim in the output */
  preamble: string[]
  table: Table
}

/**
 * All sheets of a workbook, keyed by name in workbook order.
 */
export type SheetSet = Map<string, Sheet>

/**
 * Column keys given to blank header cells start with this marker and are
 * written back as blank headers.
 */
export const EMPTY_HEADER_PREFIX = '__EMPTY'

/**
 * Creates a table from column keys and rows, filling missing cells with ''.
 *
 * @param name - Sheet name
 * @param columns - Ordered column keys
 * @param rows - Partial rows
 */
export function createTable(
  name: string,
  columns: string[],
  rows: Array<Partial<Row>> = []
): Table {
  return {
    name,
    columns: [...columns],
    rows: rows.map((row) => {
      const full: Row = {}
      for (const column of columns) {
        full[column] = row[column] ?? ''
      }
      return full
    }),
  }
}

/**
 * Deep copy of a table. The pipeline works on copies so callers keep their input.
 */
export function cloneTable(table: Table): Table {
  const copy: Table = {
    name: table.name,
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  }
  if (table.labels) {
    copy.labels = { ...table.labels }
  }
  return copy
}

/**
 * Header text of a column: its label when it has one, otherwise the key.
 * Keys made up for blank headers read as blank.
 */
export function columnLabel(table: Table, column: string): string {
  return table.labels?.[column] ?? defaultColumnLabel(column)
}

/**
 * Header text a column key stands for when the table keeps no label for it
 */
export function defaultColumnLabel(column: string): string {
  return column.startsWith(EMPTY_HEADER_PREFIX) ? '' : column
}

/**
 * Reads a cell as text, '' when the column is absent from the row.
 */
export function cellText(row: Row, column: string): string {
  return row[column] ?? ''
}

/**
 * Returns `name`, or `name_<n>` with the smallest n that is not yet taken.
 * Adds the returned key to `taken`.
 */
export function uniqueColumnKey(name: string, taken: Set<string>): string {
  let key = name
  for (let n = 1; taken.has(key); n++) {
    key = `${name}_${n}`
  }
  taken.add(key)
  return key
}
