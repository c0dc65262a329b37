// Main entry point
export { CommonSupplier, UploadBuilder } from './builder/upload-builder.js'
export {
  UploadProcessor,
  type UploadProcessorOptions,
  type UploadResult,
} from './processor/upload-processor.js'

// Types
export * from './types/index.js'

// Configuration
export {
  resolveUploadConfig,
  validateUploadConfig,
  requiredSheetNames,
  optionalSheetNames,
} from './core/config.js'

// Tables
export { normalizeHeader, normalizeHeaders } from './core/tables/header-normalizer.js'
export {
  findColumn,
  tryFindColumn,
  ensureColumn,
  foldColumnName,
} from './core/tables/column-resolver.js'

// Identity
export * from './identity/index.js'

// Ledger
export {
  MutationLedger,
  createMutationLedger,
  writeCell,
  type MutationRecord,
} from './ledger/mutation-ledger.js'

// Mutators
export * from './mutators/index.js'

// Pipeline
export {
  runMergePipeline,
  assertRequiredSheets,
  type MergeOutcome,
  type MergeStats,
} from './pipeline/merge-pipeline.js'

// Workbook
export {
  readWorkbook,
  readWorkbookFile,
  worksheetToSheet,
  cellValueToText,
  tablesOf,
  preamblesOf,
} from './workbook/workbook-reader.js'
export {
  assembleWorkbook,
  writeWorkbook,
  writeWorkbookFile,
} from './workbook/workbook-writer.js'
export {
  applyPresentation,
  isIdentifierHeader,
  type PresentationSummary,
} from './workbook/presentation.js'

// Errors
export {
  SupplierMergeError,
  MissingSheetError,
  MissingColumnError,
  WorkbookIOError,
  PairConflictError,
  PairValidationError,
  ConfigurationError,
  isSupplierMergeError,
  requireNonEmptyArray,
  requireNonEmptyString,
  type PairIssue,
  type WorkbookPhase,
} from './utils/errors.js'

// Logging
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createSheetLogger,
  type ConsoleLoggerOptions,
  type LogContext,
  type LogLevel,
  type Logger,
} from './utils/logger.js'
