/**
 * Role annotation from the partner-role sheet
 * @module identity/role-annotator
 */

import type { Table } from '../types/table.js'
import type { IdentifierRole } from '../types/identity.js'
import type { IdentifierRegistry } from './identifier-registry.js'

/**
 * Counts how often each identifier occurs in a column (values trimmed, blanks ignored)
 */
export function countOccurrences(table: Table, column: string): Map<string, number> {
  const counts = new Map<string, number>()
  for (const row of table.rows) {
    const id = (row[column] ?? '').trim()
    if (id === '') continue
    counts.set(id, (counts.get(id) ?? 0) + 1)
  }
  return counts
}

/**
 * Assigns every registered identifier its role: `PO` when it appears more
 * than once in the role sheet, `NPO` otherwise.
 *
 * The role is descriptive only; no mutation rule depends on it.
 *
 * @returns Role per identifier, in registry order
 */
export function annotateRoles(
  registry: IdentifierRegistry,
  roleTable: Table,
  sourceColumn: string
): Map<string, IdentifierRole> {
  const counts = countOccurrences(roleTable, sourceColumn)
  const roles = new Map<string, IdentifierRole>()
  for (const id of registry.ids()) {
    const role: IdentifierRole = (counts.get(id) ?? 0) > 1 ? 'PO' : 'NPO'
    registry.assignRole(id, role)
    roles.set(id, role)
  }
  return roles
}
