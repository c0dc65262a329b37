/**
 * Per-run registry of classified identifiers
 * @module identity/identifier-registry
 */

import type {
  IdentifierClassification,
  IdentifierRecord,
  IdentifierRole,
} from '../types/identity.js'

/**
 * IdentifierRegistry - Holds one record per distinct identifier for a run.
 *
 * Built by a classification strategy, annotated once by the role annotator,
 * then passed to every table mutator. Nothing global: each run constructs its own.
 */
export class IdentifierRegistry {
  private readonly records = new Map<string, IdentifierRecord>()

  /**
   * Sets the classification of an identifier, creating its record if needed
   */
  classify(id: string, classification: IdentifierClassification): void {
    const existing = this.records.get(id)
    if (existing) {
      existing.classification = classification
      return
    }
    this.records.set(id, { id, classification })
  }

  /**
   * Assigns the role of a known identifier.
   *
   * @throws Error if the role was already assigned
   */
  assignRole(id: string, role: IdentifierRole): void {
    const record = this.records.get(id)
    if (!record) return
    if (record.role !== undefined) {
      throw new Error(`Role for identifier '${id}' has already been assigned`)
    }
    record.role = role
  }

  get(id: string): Readonly<IdentifierRecord> | undefined {
    return this.records.get(id)
  }

  has(id: string): boolean {
    return this.records.has(id)
  }

  isChild(id: string): boolean {
    return this.records.get(id)?.classification === 'child'
  }

  isParent(id: string): boolean {
    return this.records.get(id)?.classification === 'parent'
  }

  /** Identifiers in insertion order */
  ids(): string[] {
    return Array.from(this.records.keys())
  }

  /** Records in insertion order */
  values(): Array<Readonly<IdentifierRecord>> {
    return Array.from(this.records.values())
  }

  /** Identifiers with the given classification, in insertion order */
  withClassification(classification: IdentifierClassification): string[] {
    return this.values()
      .filter((record) => record.classification === classification)
      .map((record) => record.id)
  }

  get size(): number {
    return this.records.size
  }
}
