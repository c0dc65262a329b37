/**
 * Mutators for the association sheets (company code, purchasing org, partner function)
 * @module mutators/association-mutator
 */

import type { Table } from '../types/table.js'
import type { SheetKey } from '../types/config.js'
import {
  ensureColumn,
  findColumn,
  tryFindColumn,
} from '../core/tables/column-resolver.js'
import { MissingColumnError } from '../utils/errors.js'
import { writeCell } from '../ledger/mutation-ledger.js'
import { FLAG_VALUE } from './field-rules.js'
import { reconcileAssociations } from './reconciliation.js'
import type { MutationContext, MutatorReport, TableMutator } from './types.js'

/**
 * Runs reconciliation on one organizational-unit column.
 *
 * On an optional sheet a missing identifier or code column is logged as a
 * warning and the sheet is left as it is; on a required sheet the
 * {@link MissingColumnError} propagates.
 */
export class AssociationMutator implements TableMutator {
  constructor(
    readonly sheet: SheetKey,
    readonly codeColumn: string,
    readonly optional: boolean
  ) {}

  apply(table: Table, context: MutationContext): MutatorReport {
    let sourceColumn: string
    let codeColumn: string
    try {
      sourceColumn = findColumn(table, context.config.sourceIdColumn)
      codeColumn = findColumn(table, this.codeColumn)
    } catch (error) {
      if (this.optional && error instanceof MissingColumnError) {
        context.logger.warn(error.message, { sheet: table.name, column: error.column })
        return { sheet: table.name, childRows: 0, changedCells: 0, inserted: 0, skipped: error.message }
      }
      throw error
    }

    const sizeBefore = context.ledger.size
    const result = reconcileAssociations(table, sourceColumn, codeColumn, context)
    this.afterReconcile(table, context)

    return {
      sheet: table.name,
      childRows: result.inserted + result.redundant + result.blank,
      changedCells: context.ledger.size - sizeBefore,
      inserted: result.inserted,
    }
  }

  /**
   * Hook for sheet-specific rules applied after reconciliation
   */
  protected afterReconcile(_table: Table, _context: MutationContext): void {}
}

/** Partner function code of the supplier itself */
export const SUPPLIER_PARTNER_FUNCTION = 'LF'

/**
 * Partner function sheet: reconciliation on purchasing org, and every row with
 * partner function `LF` marked as the default partner, whatever its identifier.
 */
export class PartnerFunctionMutator extends AssociationMutator {
  static readonly PARTNER_FUNCTION_COLUMN = 'PARVW'
  static readonly DEFAULT_PARTNER_COLUMN = 'DEFPA'

  constructor() {
    super('partnerFunction', 'EKORG', true)
  }

  protected afterReconcile(table: Table, context: MutationContext): void {
    const partnerFunctionColumn = tryFindColumn(
      table,
      PartnerFunctionMutator.PARTNER_FUNCTION_COLUMN
    )
    const defaultColumn = ensureColumn(table, PartnerFunctionMutator.DEFAULT_PARTNER_COLUMN)
    if (partnerFunctionColumn === undefined) return

    table.rows.forEach((row, index) => {
      const partnerFunction = (row[partnerFunctionColumn] ?? '').trim().toUpperCase()
      if (partnerFunction === SUPPLIER_PARTNER_FUNCTION) {
        writeCell(table, index, defaultColumn, FLAG_VALUE, context.ledger)
      }
    })
  }
}
