/**
 * Table mutator contract
 * @module mutators/types
 */

import type { Table } from '../types/table.js'
import type { SheetKey, UploadConfig } from '../types/config.js'
import type { Classification } from '../identity/types.js'
import type { MutationLedger } from '../ledger/mutation-ledger.js'
import type { Logger } from '../utils/logger.js'

/**
 * Everything a mutator needs besides its table
 */
export interface MutationContext {
  classification: Classification
  ledger: MutationLedger
  config: UploadConfig
  logger: Logger
}

/**
 * Outcome of one mutator pass
 */
export interface MutatorReport {
  sheet: string
  /** Rows belonging to a child identifier */
  childRows: number
  /** Distinct cells changed by this pass */
  changedCells: number
  /** Association rows redirected to their parent and flagged for insert */
  inserted: number
  /** Set when the pass was skipped; holds the reason */
  skipped?: string
}

/**
 * Applies the merge rules of one sheet.
 *
 * Required-sheet mutators let {@link MissingColumnError} propagate;
 * optional-sheet mutators report the pass as skipped instead.
 */
export interface TableMutator {
  readonly sheet: SheetKey
  readonly optional: boolean
  apply(table: Table, context: MutationContext): MutatorReport
}

/**
 * Clear / fill / rename columns applied to every child row
 */
export interface FieldRuleSet {
  /** Columns set to '' */
  clear: readonly string[]
  /** Columns set to the flag value */
  fill: readonly string[]
  /** Columns set to the common supplier name */
  rename: readonly string[]
}
