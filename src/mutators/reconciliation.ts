/**
 * Reconciliation of organizational-unit associations
 * @module mutators/reconciliation
 */

import type { Table } from '../types/table.js'
import { ensureColumn } from '../core/tables/column-resolver.js'
import { writeCell } from '../ledger/mutation-ledger.js'
import { childRowIndexes, rowIdentifier } from './field-rules.js'
import type { MutationContext } from './types.js'

/** Column telling the upload what to do with a row */
export const ACTION_CODE_COLUMN = '_ACTION_CODE'

/** Action code for a row to be inserted */
export const INSERT_ACTION = 'I'

/**
 * Counts from one reconciliation pass over the child rows
 */
export interface ReconciliationResult {
  /** Redirected to the parent and flagged for insert */
  inserted: number
  /** Code already associated with the parent; left untouched */
  redundant: number
  /** No code; left untouched */
  blank: number
}

/**
 * Distinct non-blank codes per identifier (both trimmed)
 */
export function collectCodesByIdentifier(
  table: Table,
  sourceColumn: string,
  codeColumn: string
): Map<string, Set<string>> {
  const codes = new Map<string, Set<string>>()
  for (const row of table.rows) {
    const id = (row[sourceColumn] ?? '').trim()
    const code = (row[codeColumn] ?? '').trim()
    if (id === '' || code === '') continue
    let set = codes.get(id)
    if (!set) {
      set = new Set()
      codes.set(id, set)
    }
    set.add(code)
  }
  return codes
}

/**
 * Folds the child rows of an association table into their parents.
 *
 * A child row whose code is not yet associated with its parent is flagged
 * with {@link INSERT_ACTION} and its identifier rewritten to the parent.
 * Rows with a blank code, or a code the parent already has, are left alone.
 *
 * Parent codes are read before any row is rewritten: rows redirected in this
 * pass do not count as parent associations for later rows of the same pass.
 * The action column is created on the table even when no row needs it.
 */
export function reconcileAssociations(
  table: Table,
  sourceColumn: string,
  codeColumn: string,
  context: MutationContext
): ReconciliationResult {
  const actionColumn = ensureColumn(table, ACTION_CODE_COLUMN)
  const codesByIdentifier = collectCodesByIdentifier(table, sourceColumn, codeColumn)
  const result: ReconciliationResult = { inserted: 0, redundant: 0, blank: 0 }

  for (const index of childRowIndexes(table, sourceColumn, context)) {
    const parent = context.classification.parentOf(rowIdentifier(table, index, sourceColumn))
    const code = (table.rows[index][codeColumn] ?? '').trim()
    if (code === '') {
      result.blank++
      continue
    }
    if (codesByIdentifier.get(parent)?.has(code)) {
      result.redundant++
      continue
    }
    writeCell(table, index, actionColumn, INSERT_ACTION, context.ledger)
    writeCell(table, index, sourceColumn, parent, context.ledger)
    result.inserted++
  }

  return result
}
