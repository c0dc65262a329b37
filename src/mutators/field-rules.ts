/**
 * Clear, fill and rename rules for child rows
 * @module mutators/field-rules
 */

import type { Table } from '../types/table.js'
import type { MutationLedger } from '../ledger/mutation-ledger.js'
import { writeCell } from '../ledger/mutation-ledger.js'
import type { FieldRuleSet, MutationContext } from './types.js'

/** Value written by fill rules */
export const FLAG_VALUE = 'X'

/**
 * Name given to every child row of a merge group
 *
 * @example
 * ```typescript
 * commonSupplierName('COMMON SUPPLIER ', '1000000003') // 'COMMON SUPPLIER 1000000003'
 * ```
 */
export function commonSupplierName(prefix: string, parentId: string): string {
  return `${prefix}${parentId}`
}

/**
 * Applies a rule set to one row. Columns the table lacks are skipped.
 *
 * @returns Number of cells that changed
 */
export function applyFieldRules(
  table: Table,
  rowIndex: number,
  rules: FieldRuleSet,
  name: string,
  ledger: MutationLedger
): number {
  let changed = 0
  for (const column of rules.clear) {
    if (writeCell(table, rowIndex, column, '', ledger)) changed++
  }
  for (const column of rules.fill) {
    if (writeCell(table, rowIndex, column, FLAG_VALUE, ledger)) changed++
  }
  for (const column of rules.rename) {
    if (writeCell(table, rowIndex, column, name, ledger)) changed++
  }
  return changed
}

/**
 * Trimmed identifier of a row
 */
export function rowIdentifier(table: Table, rowIndex: number, sourceColumn: string): string {
  return (table.rows[rowIndex]?.[sourceColumn] ?? '').trim()
}

/**
 * Indexes of rows whose identifier is classified as child
 */
export function childRowIndexes(
  table: Table,
  sourceColumn: string,
  context: MutationContext
): number[] {
  const { registry } = context.classification
  const indexes: number[] = []
  table.rows.forEach((_, index) => {
    if (registry.isChild(rowIdentifier(table, index, sourceColumn))) {
      indexes.push(index)
    }
  })
  return indexes
}
