/**
 * Classification from caller-supplied parent/child pairs
 * @module identity/explicit-pairs-strategy
 */

import type { MergePair } from '../types/identity.js'
import { PairConflictError, requireNonEmptyArray } from '../utils/errors.js'
import { IdentifierRegistry } from './identifier-registry.js'
import type {
  Classification,
  ClassificationInput,
  ClassificationStrategy,
} from './types.js'

/**
 * Classifies identifiers from an ordered list of (parent, child) pairs.
 *
 * Several independent groups may be merged in one run. Repeating the same pair
 * is harmless, but an identifier used as both parent and child, or a child
 * given two different parents, is rejected with {@link PairConflictError}.
 *
 * Identifier format and existence are not checked here; see `validatePairs`.
 */
export class ExplicitPairsStrategy implements ClassificationStrategy {
  readonly mode = 'explicit-pairs' as const
  private readonly pairs: readonly MergePair[]

  constructor(pairs: readonly MergePair[]) {
    requireNonEmptyArray(pairs, 'pairs')
    this.pairs = pairs.map((pair) => ({
      parent: String(pair.parent).trim(),
      child: String(pair.child).trim(),
    }))
  }

  classify(input: ClassificationInput): Classification {
    const identityMap = new Map<string, string>()
    const parents = new Set<string>()

    this.pairs.forEach(({ parent, child }, index) => {
      const pair = index + 1
      if (parent === child) {
        throw new PairConflictError(child, `pair #${pair} merges the identifier into itself`, { pair })
      }
      const existingParent = identityMap.get(child)
      if (existingParent !== undefined && existingParent !== parent) {
        throw new PairConflictError(
          child,
          `pair #${pair} maps it to '${parent}' but it is already a child of '${existingParent}'`,
          { pair }
        )
      }
      if (identityMap.has(parent)) {
        throw new PairConflictError(
          parent,
          `pair #${pair} uses it as a parent but it is a child of '${identityMap.get(parent)}'`,
          { pair }
        )
      }
      if (parents.has(child)) {
        throw new PairConflictError(
          child,
          `pair #${pair} uses it as a child but it is a parent in an earlier pair`,
          { pair }
        )
      }
      identityMap.set(child, parent)
      parents.add(parent)
    })

    const registry = new IdentifierRegistry()
    for (const { parent, child } of this.pairs) {
      registry.classify(parent, 'parent')
      registry.classify(child, 'child')
    }

    return {
      mode: this.mode,
      registry,
      identityMap,
      parentOf: (child) => identityMap.get(child) ?? input.fallbackParentId,
      flagsNonChildReports: true,
    }
  }

  /** The trimmed pairs this strategy classifies from */
  getPairs(): readonly MergePair[] {
    return this.pairs
  }
}
