/**
 * End-to-end processing of an extract workbook into an upload workbook
 * @module processor/upload-processor
 */

import type { UploadConfig } from '../types/config.js'
import type { MergePair } from '../types/identity.js'
import type { ClassificationStrategy } from '../identity/types.js'
import { ExplicitPairsStrategy } from '../identity/explicit-pairs-strategy.js'
import { assertValidPairs } from '../identity/pair-validation.js'
import { findColumn } from '../core/tables/column-resolver.js'
import { normalizeHeaders } from '../core/tables/header-normalizer.js'
import { cloneTable } from '../types/table.js'
import type { SheetSet, Table } from '../types/table.js'
import {
  assertRequiredSheets,
  runMergePipeline,
  type MergeOutcome,
} from '../pipeline/merge-pipeline.js'
import {
  preamblesOf,
  readWorkbook,
  readWorkbookFile,
  tablesOf,
} from '../workbook/workbook-reader.js'
import {
  assembleWorkbook,
  writeWorkbook,
  writeWorkbookFile,
} from '../workbook/workbook-writer.js'
import { applyPresentation, type PresentationSummary } from '../workbook/presentation.js'
import type { Logger } from '../utils/logger.js'

/**
 * Settings of an {@link UploadProcessor}
 */
export interface UploadProcessorOptions {
  strategy: ClassificationStrategy
  config: UploadConfig
  logger: Logger
  /** Check pair format and existence before merging (explicit pairs only) */
  validatePairs: boolean
}

/**
 * Result of processing one workbook
 */
export interface UploadResult {
  /** The upload workbook */
  bytes: Uint8Array
  outcome: MergeOutcome
  presentation: PresentationSummary
}

/**
 * Reads an extract, merges child suppliers into their parents and writes the
 * styled upload workbook. Holds no state between calls.
 *
 * @example
 * ```typescript
 * const processor = CommonSupplier.create()
 *   .pairs([{ parent: '1000000003', child: '1000000004' }])
 *   .build()
 * const { bytes, outcome } = await processor.process(inputBytes)
 * ```
 */
export class UploadProcessor {
  constructor(private readonly options: UploadProcessorOptions) {}

  /**
   * Processes workbook bytes
   *
   * @throws {MissingSheetError | MissingColumnError | WorkbookIOError | PairValidationError | PairConflictError}
   */
  async process(input: Uint8Array | ArrayBuffer): Promise<UploadResult> {
    const sheets = await readWorkbook(input)
    return this.processSheets(sheets)
  }

  /**
   * Processes a workbook file and writes the result
   */
  async processFile(inputPath: string, outputPath: string): Promise<UploadResult> {
    const sheets = await readWorkbookFile(inputPath)
    const result = await this.processSheets(sheets)
    await writeWorkbookFile(outputPath, result.bytes)
    this.options.logger.info(`Output saved as ${outputPath}`)
    return result
  }

  /**
   * Runs the pipeline on sheets already read
   */
  async processSheets(sheets: SheetSet): Promise<UploadResult> {
    const { strategy, config, logger } = this.options
    const tables = tablesOf(sheets)

    if (this.options.validatePairs && strategy instanceof ExplicitPairsStrategy) {
      this.checkPairs(tables, strategy.getPairs())
    }

    const outcome = runMergePipeline(tables, strategy, { config, logger })

    logger.info('Saving results and applying highlights')
    const workbook = assembleWorkbook(outcome.tables, preamblesOf(sheets))
    const presentation = applyPresentation(workbook, outcome.tables, outcome.ledger, config)
    const bytes = await writeWorkbook(workbook)

    return { bytes, outcome, presentation }
  }

  getConfig(): UploadConfig {
    return this.options.config
  }

  private checkPairs(tables: ReadonlyMap<string, Table>, pairs: readonly MergePair[]): void {
    const { config } = this.options
    assertRequiredSheets(tables.keys(), config)
    const original = tables.get(config.sheets.general)
    if (!original) return
    const baseTable = normalizeHeaders(cloneTable(original))
    assertValidPairs(pairs, baseTable, findColumn(baseTable, config.sourceIdColumn))
  }
}
