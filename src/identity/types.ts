/**
 * Classification strategy contract
 * @module identity/types
 */

import type { Table } from '../types/table.js'
import type { ClassificationMode, IdentityMap } from '../types/identity.js'
import type { IdentifierRegistry } from './identifier-registry.js'

/**
 * Result of classifying the identifiers of a run
 */
export interface Classification {
  mode: ClassificationMode
  registry: IdentifierRegistry
  /** Child → parent. Positional mode maps every child to the single target */
  identityMap: IdentityMap
  /**
   * Resolves the parent a child row is merged into. Children missing from
   * the identity map resolve to the fallback parent.
   */
  parentOf(child: string): string
  /**
   * Whether non-child rows of the general sheet get their report flags set.
   * Only explicit pairs turn this on.
   */
  flagsNonChildReports: boolean
}

/**
 * Input handed to a strategy
 */
export interface ClassificationInput {
  /** The general sheet, headers normalized */
  baseTable: Table
  /** Resolved identifier column of the base table */
  sourceColumn: string
  /** Parent used when none can be determined */
  fallbackParentId: string
}

/**
 * A pluggable way of deciding which identifiers are parents and which are children.
 *
 * @example
 * ```typescript
 * const strategy: ClassificationStrategy = new ExplicitPairsStrategy(pairs)
 * const { registry, parentOf } = strategy.classify({ baseTable, sourceColumn, fallbackParentId })
 * ```
 */
export interface ClassificationStrategy {
  readonly mode: ClassificationMode
  classify(input: ClassificationInput): Classification
}
