/**
 * Whether an identifier survives a merge (`parent`) or is folded into one (`child`).
 */
export type IdentifierClassification = 'parent' | 'child'

/**
 * Partner-role category derived from the role sheet.
 * - `PO`: the identifier appears more than once in the role sheet
 * - `NPO`: it appears at most once
 */
export type IdentifierRole = 'PO' | 'NPO'

/**
 * Per-identifier record held by the registry for one run.
 */
export interface IdentifierRecord {
  /** Supplier identifier, normally 10 digits */
  id: string
  classification: IdentifierClassification
  /** Set once by the role annotator; undefined before annotation */
  role?: IdentifierRole
}

/**
 * Child identifier → parent identifier.
 * A parent is never a key; several children may share a parent.
 */
export type IdentityMap = ReadonlyMap<string, string>

/**
 * A user-supplied merge instruction
 */
export interface MergePair {
  parent: string
  child: string
}

/**
 * How identifiers were classified for a run
 * - `explicit-pairs`: from caller-supplied parent/child pairs, any number of groups
 * - `positional`: from the 4th character of each identifier, single target
 */
export type ClassificationMode = 'explicit-pairs' | 'positional'
