import type { Logger } from '../utils/logger.js'

/**
 * Logical names of the sheets the pipeline knows about.
 */
export type SheetKey =
  | 'general'
  | 'role'
  | 'address'
  | 'supplierGeneral'
  | 'companyCode'
  | 'purchasingOrg'
  | 'partnerFunction'

/**
 * Sheets that must be present for a run to start
 */
export const REQUIRED_SHEET_KEYS: readonly SheetKey[] = [
  'general',
  'role',
  'address',
  'supplierGeneral',
  'companyCode',
]

/**
 * Sheets processed only when present
 */
export const OPTIONAL_SHEET_KEYS: readonly SheetKey[] = [
  'purchasingOrg',
  'partnerFunction',
]

/**
 * Actual sheet names in the extract, by logical key.
 */
export type SheetNames = Record<SheetKey, string>

/**
 * Cosmetic rules applied to the assembled workbook.
 * Colours are 6-digit RGB hex strings.
 */
export interface PresentationConfig {
  /** Fill for every changed cell */
  highlightColor: string
  /** Fill for the preamble and header rows */
  bannerColor: string
  /** Border colour for the preamble and header rows */
  bannerBorderColor: string
  /** Number of leading rows styled as banner */
  bannerRows: number
  /** Sheets where only changed columns and the identifier column stay visible */
  changedColumnsOnly: SheetKey[]
  /** Columns always hidden, per sheet */
  hiddenColumns: Partial<Record<SheetKey, string[]>>
  /** Known sheets hidden in the output anyway */
  hiddenSheets: SheetKey[]
}

/**
 * Complete configuration for a run.
 */
export interface UploadConfig {
  sheets: SheetNames
  /** Logical name of the identifier column in every sheet */
  sourceIdColumn: string
  /** Prefix of the name written on child rows; the parent id follows it */
  namePrefix: string
  /** Parent used when no parent can be determined */
  fallbackParentId: string
  presentation: PresentationConfig
}

/**
 * Default configuration matching the vendor-master extract layout
 */
export const DEFAULT_UPLOAD_CONFIG: UploadConfig = {
  sheets: {
    general: 'BUT000 - General',
    role: 'BUT100 - Role',
    address: 'ADRC - Address',
    supplierGeneral: 'LFA1 - Supplier General',
    companyCode: 'LFB1 - Company Code (Supplier)',
    purchasingOrg: 'LFM1 - Purchasing Org Data',
    // Sheet names are capped at 31 characters in the source system export
    partnerFunction: 'WYT3 - Partner Function (Suppli',
  },
  sourceIdColumn: 'Source_ID',
  namePrefix: 'COMMON SUPPLIER ',
  fallbackParentId: '0000000000',
  presentation: {
    highlightColor: 'FFFF00',
    bannerColor: 'DBD5BF',
    bannerBorderColor: '000000',
    bannerRows: 2,
    changedColumnsOnly: ['general', 'address'],
    hiddenColumns: {
      partnerFunction: ['ERNAM', 'ERDAT', 'LIFN2', 'LIFNR'],
    },
    hiddenSheets: ['role'],
  },
}

/**
 * Partial overrides accepted by the builder; nested objects merge shallowly.
 */
export interface UploadConfigOverrides {
  sheets?: Partial<SheetNames>
  sourceIdColumn?: string
  namePrefix?: string
  fallbackParentId?: string
  presentation?: Partial<PresentationConfig>
}

/**
 * Runtime options for a pipeline run
 */
export interface RunOptions {
  config?: UploadConfig
  logger?: Logger
}
