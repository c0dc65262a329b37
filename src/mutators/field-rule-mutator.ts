/**
 * Mutators for the master-data sheets (general, address, supplier general)
 * @module mutators/field-rule-mutator
 */

import type { Table } from '../types/table.js'
import type { SheetKey } from '../types/config.js'
import { findColumn } from '../core/tables/column-resolver.js'
import { writeCell } from '../ledger/mutation-ledger.js'
import {
  FLAG_VALUE,
  applyFieldRules,
  childRowIndexes,
  commonSupplierName,
  rowIdentifier,
} from './field-rules.js'
import type {
  FieldRuleSet,
  MutationContext,
  MutatorReport,
  TableMutator,
} from './types.js'

/**
 * Applies a fixed {@link FieldRuleSet} to every child row of a sheet.
 * Subclasses may resolve extra rename columns or touch non-child rows.
 */
export class FieldRuleMutator implements TableMutator {
  readonly optional = false

  constructor(
    readonly sheet: SheetKey,
    protected readonly rules: FieldRuleSet
  ) {}

  apply(table: Table, context: MutationContext): MutatorReport {
    const sourceColumn = findColumn(table, context.config.sourceIdColumn)
    const rules = this.resolveRules(table)
    const sizeBefore = context.ledger.size
    const children = childRowIndexes(table, sourceColumn, context)

    for (const index of children) {
      const parent = context.classification.parentOf(
        rowIdentifier(table, index, sourceColumn)
      )
      applyFieldRules(
        table,
        index,
        rules,
        commonSupplierName(context.config.namePrefix, parent),
        context.ledger
      )
    }
    this.afterChildren(table, sourceColumn, new Set(children), context)

    return {
      sheet: table.name,
      childRows: children.length,
      changedCells: context.ledger.size - sizeBefore,
      inserted: 0,
    }
  }

  /**
   * Rule set actually applied to this table
   */
  protected resolveRules(_table: Table): FieldRuleSet {
    return this.rules
  }

  /**
   * Hook run once all child rows are processed
   */
  protected afterChildren(
    _table: Table,
    _sourceColumn: string,
    _children: ReadonlySet<number>,
    _context: MutationContext
  ): void {}
}

/**
 * Party master rules
 */
export const GENERAL_RULES: FieldRuleSet = {
  clear: [
    'NAME_ORG2',
    'NAME_ORG3',
    'NAME_ORG4',
    'MC_NAME2',
    'MC_NAME3',
    'MC_NAME4',
    'ZGSTS_SLP_REP_FLG',
    'ZGSTS_CMT_REP_FLG',
    'ZGSTS_ATL_REP_FLG',
  ],
  fill: ['ZGSTS_AVN_REP_FLG', 'XDELE'],
  rename: ['MC_NAME1', 'NAME_ORG1'],
}

/**
 * Report flags set on every non-child row when merging from explicit pairs
 */
export const GENERAL_REPORT_FLAGS: readonly string[] = [
  'ZGSTS_CMT_REP_FLG',
  'ZGSTS_ATL_REP_FLG',
]

/**
 * Party master sheet
 */
export class GeneralMutator extends FieldRuleMutator {
  constructor() {
    super('general', GENERAL_RULES)
  }

  protected afterChildren(
    table: Table,
    _sourceColumn: string,
    children: ReadonlySet<number>,
    context: MutationContext
  ): void {
    if (!context.classification.flagsNonChildReports) return
    table.rows.forEach((_, index) => {
      if (children.has(index)) return
      for (const column of GENERAL_REPORT_FLAGS) {
        writeCell(table, index, column, FLAG_VALUE, context.ledger)
      }
    })
  }
}

/**
 * Address sheet: only the name line is renamed. The name column is
 * required and resolved case- and space-insensitively.
 */
export class AddressMutator extends FieldRuleMutator {
  static readonly NAME_COLUMN = 'Name1'

  constructor() {
    super('address', { clear: [], fill: [], rename: [] })
  }

  protected resolveRules(table: Table): FieldRuleSet {
    return { ...this.rules, rename: [findColumn(table, AddressMutator.NAME_COLUMN)] }
  }
}

/**
 * Supplier general sheet rules
 */
export const SUPPLIER_GENERAL_RULES: FieldRuleSet = {
  clear: ['NAME2', 'NAME3', 'NAME4'],
  fill: ['LOEVM', 'SPERR', 'SPERM'],
  rename: ['NAME1'],
}

/**
 * Supplier general sheet
 */
export class SupplierGeneralMutator extends FieldRuleMutator {
  constructor() {
    super('supplierGeneral', SUPPLIER_GENERAL_RULES)
  }
}
