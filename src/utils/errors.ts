/**
 * Central error classes and validation utilities for common-supplier
 * @module utils/errors
 */

/**
 * Base error class for all common-supplier errors
 */
export class SupplierMergeError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SupplierMergeError'
    this.code = code
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required sheet is absent from the input workbook.
 * Always fatal: raised before any table is touched.
 */
export class MissingSheetError extends SupplierMergeError {
  public readonly sheet: string

  constructor(sheet: string, context?: Record<string, unknown>) {
    super(`Missing required sheet: '${sheet}'`, 'MISSING_SHEET', {
      sheet,
      ...context,
    })
    this.name = 'MissingSheetError'
    this.sheet = sheet
  }
}

/**
 * Error thrown when a column cannot be resolved in a table
 */
export class MissingColumnError extends SupplierMergeError {
  public readonly column: string
  public readonly sheet?: string

  constructor(column: string, sheet?: string, context?: Record<string, unknown>) {
    super(
      sheet
        ? `Column '${column}' not found in sheet '${sheet}'`
        : `Column '${column}' not found`,
      'MISSING_COLUMN',
      { column, sheet, ...context }
    )
    this.name = 'MissingColumnError'
    this.column = column
    this.sheet = sheet
  }
}

export type WorkbookPhase = 'read' | 'write'

/**
 * Error thrown when the workbook cannot be read or written
 */
export class WorkbookIOError extends SupplierMergeError {
  public readonly phase: WorkbookPhase
  public readonly file?: string

  constructor(
    phase: WorkbookPhase,
    reason: string,
    options?: { file?: string; cause?: unknown }
  ) {
    const target = options?.file ? ` '${options.file}'` : ''
    super(
      `Failed to ${phase} workbook${target}: ${reason}`,
      'IO_FAILURE',
      { phase, reason, file: options?.file, cause: options?.cause }
    )
    this.name = 'WorkbookIOError'
    this.phase = phase
    this.file = options?.file
  }
}

/**
 * Error thrown when the parent/child pairs contradict each other
 */
export class PairConflictError extends SupplierMergeError {
  public readonly identifier: string

  constructor(identifier: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Conflicting pairs for identifier '${identifier}': ${reason}`,
      'PAIR_CONFLICT',
      { identifier, reason, ...context }
    )
    this.name = 'PairConflictError'
    this.identifier = identifier
  }
}

/**
 * A single problem found while checking a parent/child pair
 */
export interface PairIssue {
  /** 1-based position of the pair in the input list */
  pair: number
  role: 'parent' | 'child'
  identifier: string
  message: string
}

/**
 * Error thrown when pre-flight pair validation finds problems
 */
export class PairValidationError extends SupplierMergeError {
  public readonly issues: PairIssue[]

  constructor(issues: PairIssue[]) {
    super(
      `Pair validation failed with ${issues.length} issue(s):\n` +
        issues.map((issue) => `  - ${issue.message}`).join('\n'),
      'PAIR_VALIDATION',
      { issues }
    )
    this.name = 'PairValidationError'
    this.issues = issues
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends SupplierMergeError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that an array is non-empty
 */
export function requireNonEmptyArray<T>(
  value: readonly T[],
  parameterName: string
): readonly T[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${parameterName} must be an array`, parameterName)
  }
  if (value.length === 0) {
    throw new ConfigurationError(`${parameterName} must not be empty`, parameterName)
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${parameterName} must be a string`, parameterName)
  }
  if (value.trim().length === 0) {
    throw new ConfigurationError(`${parameterName} must not be empty`, parameterName)
  }
  return value
}

/**
 * Check if an error is a common-supplier error
 */
export function isSupplierMergeError(error: unknown): error is SupplierMergeError {
  return error instanceof SupplierMergeError
}
