/**
 * Identifier classification module
 * @module identity
 */

export type {
  Classification,
  ClassificationInput,
  ClassificationStrategy,
} from './types.js'

export { IdentifierRegistry } from './identifier-registry.js'
export { ExplicitPairsStrategy } from './explicit-pairs-strategy.js'
export {
  PositionalStrategy,
  hasParentMarker,
  PARENT_MARKER,
  PARENT_MARKER_INDEX,
} from './positional-strategy.js'
export { annotateRoles, countOccurrences } from './role-annotator.js'
export {
  validatePairs,
  assertValidPairs,
  isValidIdentifierFormat,
  IDENTIFIER_LENGTH,
} from './pair-validation.js'
