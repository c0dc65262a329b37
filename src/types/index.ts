export type { Row, Table, Sheet, SheetSet } from './table.js'
export {
  EMPTY_HEADER_PREFIX,
  createTable,
  cloneTable,
  columnLabel,
  defaultColumnLabel,
  cellText,
  uniqueColumnKey,
} from './table.js'

export type {
  IdentifierClassification,
  IdentifierRole,
  IdentifierRecord,
  IdentityMap,
  MergePair,
  ClassificationMode,
} from './identity.js'

export type {
  SheetKey,
  SheetNames,
  PresentationConfig,
  UploadConfig,
  UploadConfigOverrides,
  RunOptions,
} from './config.js'
export {
  REQUIRED_SHEET_KEYS,
  OPTIONAL_SHEET_KEYS,
  DEFAULT_UPLOAD_CONFIG,
} from './config.js'
