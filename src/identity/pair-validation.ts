/**
 * Pre-flight checks for parent/child pairs
 * @module identity/pair-validation
 */

import type { Table } from '../types/table.js'
import type { MergePair } from '../types/identity.js'
import { PairValidationError, type PairIssue } from '../utils/errors.js'

/** Identifiers are exactly this many digits, leading zeros included */
export const IDENTIFIER_LENGTH = 10

const DIGITS = /^\d+$/

/**
 * True for an identifier of exactly {@link IDENTIFIER_LENGTH} digits
 */
export function isValidIdentifierFormat(id: string): boolean {
  return id.length === IDENTIFIER_LENGTH && DIGITS.test(id)
}

/**
 * Checks every pair for identifier format and for presence in the base table.
 * All format issues are listed before all existence issues.
 *
 * @param pairs - Pairs as entered
 * @param baseTable - The general sheet
 * @param sourceColumn - Resolved identifier column of the base table
 * @returns Every issue found, empty when the pairs are usable
 */
export function validatePairs(
  pairs: readonly MergePair[],
  baseTable: Table,
  sourceColumn: string
): PairIssue[] {
  const issues: PairIssue[] = []
  const known = new Set<string>()
  for (const row of baseTable.rows) {
    const id = (row[sourceColumn] ?? '').trim()
    if (id !== '') known.add(id)
  }

  const trimmed = pairs.map((pair) => ({
    parent: pair.parent.trim(),
    child: pair.child.trim(),
  }))

  trimmed.forEach(({ parent, child }, index) => {
    const pair = index + 1
    if (!isValidIdentifierFormat(parent)) {
      issues.push({
        pair,
        role: 'parent',
        identifier: parent,
        message: `Pair #${pair}: parent ID '${parent}' must be exactly ${IDENTIFIER_LENGTH} digits`,
      })
    }
    if (!isValidIdentifierFormat(child)) {
      issues.push({
        pair,
        role: 'child',
        identifier: child,
        message: `Pair #${pair}: child ID '${child}' must be exactly ${IDENTIFIER_LENGTH} digits`,
      })
    }
  })

  trimmed.forEach(({ parent, child }, index) => {
    const pair = index + 1
    if (!known.has(parent)) {
      issues.push({
        pair,
        role: 'parent',
        identifier: parent,
        message: `Pair #${pair}: parent ID '${parent}' not found in ${baseTable.name}`,
      })
    }
    if (!known.has(child)) {
      issues.push({
        pair,
        role: 'child',
        identifier: child,
        message: `Pair #${pair}: child ID '${child}' not found in ${baseTable.name}`,
      })
    }
  })

  return issues
}

/**
 * Like {@link validatePairs} but throws when anything is wrong.
 *
 * @throws {PairValidationError} Listing every issue
 */
export function assertValidPairs(
  pairs: readonly MergePair[],
  baseTable: Table,
  sourceColumn: string
): void {
  const issues = validatePairs(pairs, baseTable, sourceColumn)
  if (issues.length > 0) {
    throw new PairValidationError(issues)
  }
}
