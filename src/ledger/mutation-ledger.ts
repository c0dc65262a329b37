/**
 * Mutation ledger recording which cells a run changed
 * @module ledger/mutation-ledger
 */

import type { Row, Table } from '../types/table.js'

/**
 * Location of a changed cell. Carries no value, only where the change happened.
 */
export interface MutationRecord {
  /** Sheet name */
  table: string
  /** 0-based data row index (the header row is not counted) */
  row: number
  /** Column key */
  column: string
}

/**
 * MutationLedger - Set of changed cells for one run
 *
 * Each (table, row, column) triple is held at most once no matter how many
 * passes touch the cell. The ledger is append-only; the presentation stage
 * reads it to decide what to highlight and which columns to keep visible.
 *
 * @example
 * ```typescript
 * const ledger = new MutationLedger()
 * ledger.record('LFA1 - Supplier General', 0, 'NAME1')
 * ledger.record('LFA1 - Supplier General', 0, 'NAME1')
 * ledger.size // 1
 * ledger.changedColumns('LFA1 - Supplier General') // Set { 'NAME1' }
 * ```
 */
export class MutationLedger {
  private readonly byTable = new Map<string, Map<number, Set<string>>>()
  private count = 0

  /**
   * Records a changed cell
   *
   * @returns True if the triple was new
   */
  record(table: string, row: number, column: string): boolean {
    let rows = this.byTable.get(table)
    if (!rows) {
      rows = new Map()
      this.byTable.set(table, rows)
    }
    let columns = rows.get(row)
    if (!columns) {
      columns = new Set()
      rows.set(row, columns)
    }
    if (columns.has(column)) {
      return false
    }
    columns.add(column)
    this.count++
    return true
  }

  has(table: string, row: number, column: string): boolean {
    return this.byTable.get(table)?.get(row)?.has(column) ?? false
  }

  /** Number of distinct changed cells */
  get size(): number {
    return this.count
  }

  /**
   * All records, grouped by table in first-recorded order
   */
  entries(): MutationRecord[] {
    const out: MutationRecord[] = []
    for (const table of this.byTable.keys()) {
      out.push(...this.forTable(table))
    }
    return out
  }

  /**
   * Records for one table
   */
  forTable(table: string): MutationRecord[] {
    const out: MutationRecord[] = []
    const rows = this.byTable.get(table)
    if (!rows) return out
    for (const [row, columns] of rows) {
      for (const column of columns) {
        out.push({ table, row, column })
      }
    }
    return out
  }

  /**
   * Columns with at least one changed cell in a table
   */
  changedColumns(table: string): Set<string> {
    const columns = new Set<string>()
    for (const rowColumns of this.byTable.get(table)?.values() ?? []) {
      for (const column of rowColumns) {
        columns.add(column)
      }
    }
    return columns
  }

  /**
   * Number of distinct rows touched in a table
   */
  changedRowCount(table: string): number {
    return this.byTable.get(table)?.size ?? 0
  }

  /** Tables with at least one change */
  tables(): string[] {
    return Array.from(this.byTable.keys())
  }
}

/**
 * Writes a cell and records it when its value actually changes.
 *
 * Old and new values are compared after trimming. A column the table does not
 * have is skipped, so a blank written over an absent or blank cell is never
 * recorded.
 *
 * @returns True if the cell changed
 */
export function writeCell(
  table: Table,
  rowIndex: number,
  column: string,
  value: string,
  ledger: MutationLedger
): boolean {
  if (!table.columns.includes(column)) {
    return false
  }
  const row: Row | undefined = table.rows[rowIndex]
  if (!row) {
    return false
  }
  const previous = row[column] ?? ''
  if (previous.trim() === value.trim()) {
    return false
  }
  row[column] = value
  ledger.record(table.name, rowIndex, column)
  return true
}

/**
 * Creates a new, empty ledger
 */
export function createMutationLedger(): MutationLedger {
  return new MutationLedger()
}
