/**
 * Classification from the identifier numbering convention
 * @module identity/positional-strategy
 */

import { IdentifierRegistry } from './identifier-registry.js'
import type {
  Classification,
  ClassificationInput,
  ClassificationStrategy,
} from './types.js'

/** 0-based position of the character that marks a parent identifier */
export const PARENT_MARKER_INDEX = 3

/** Character that marks a parent identifier */
export const PARENT_MARKER = '3'

/**
 * True when the identifier carries the parent marker
 */
export function hasParentMarker(id: string): boolean {
  return id.length > PARENT_MARKER_INDEX && id[PARENT_MARKER_INDEX] === PARENT_MARKER
}

/**
 * Classifies every identifier of the base table by its 4th character:
 * `'3'` is a parent, anything else a child.
 *
 * Only one merge target per run: the first parent in row order. Every child
 * merges into it, or into the fallback parent when the table has no parent.
 */
export class PositionalStrategy implements ClassificationStrategy {
  readonly mode = 'positional' as const

  classify(input: ClassificationInput): Classification {
    const { baseTable, sourceColumn, fallbackParentId } = input
    const registry = new IdentifierRegistry()

    for (const row of baseTable.rows) {
      const id = (row[sourceColumn] ?? '').trim()
      if (id === '' || registry.has(id)) continue
      registry.classify(id, hasParentMarker(id) ? 'parent' : 'child')
    }

    const target = registry.withClassification('parent')[0] ?? fallbackParentId
    const identityMap = new Map<string, string>()
    for (const child of registry.withClassification('child')) {
      identityMap.set(child, target)
    }

    return {
      mode: this.mode,
      registry,
      identityMap,
      parentOf: () => target,
      flagsNonChildReports: false,
    }
  }
}
