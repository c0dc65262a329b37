/**
 * Merge pipeline: classification, role annotation and table mutation
 * @module pipeline/merge-pipeline
 */

import type { Table } from '../types/table.js'
import { cloneTable } from '../types/table.js'
import type { IdentifierRole } from '../types/identity.js'
import type { RunOptions, UploadConfig } from '../types/config.js'
import { DEFAULT_UPLOAD_CONFIG, OPTIONAL_SHEET_KEYS } from '../types/config.js'
import { requiredSheetNames } from '../core/config.js'
import { normalizeHeaders } from '../core/tables/header-normalizer.js'
import { findColumn } from '../core/tables/column-resolver.js'
import type { Classification, ClassificationStrategy } from '../identity/types.js'
import { annotateRoles } from '../identity/role-annotator.js'
import { MutationLedger } from '../ledger/mutation-ledger.js'
import { createDefaultMutators } from '../mutators/index.js'
import type { MutationContext, MutatorReport } from '../mutators/types.js'
import { MissingSheetError } from '../utils/errors.js'
import { createSheetLogger, createSilentLogger } from '../utils/logger.js'

/**
 * Summary numbers of a run
 */
export interface MergeStats {
  parents: number
  children: number
  changedCells: number
  insertedRows: number
  durationMs: number
}

/**
 * Everything a run produced
 */
export interface MergeOutcome {
  /** Every input table in input order; processed ones mutated, all of them copies */
  tables: Map<string, Table>
  ledger: MutationLedger
  classification: Classification
  roles: Map<string, IdentifierRole>
  reports: MutatorReport[]
  /** Degraded optional-sheet passes */
  warnings: string[]
  stats: MergeStats
}

/**
 * Fails with {@link MissingSheetError} on the first required sheet not present
 */
export function assertRequiredSheets(
  sheetNames: Iterable<string>,
  config: UploadConfig
): void {
  const present = new Set(sheetNames)
  for (const name of requiredSheetNames(config)) {
    if (!present.has(name)) {
      throw new MissingSheetError(name)
    }
  }
}

/**
 * Runs the merge over a set of tables.
 *
 * The input tables are not modified. Missing required sheets abort the run
 * before anything is mutated; a missing optional sheet is skipped.
 *
 * @param tables - Tables keyed by sheet name, in workbook order
 * @param strategy - How parents and children are decided
 * @param options - Configuration and logger
 *
 * @example
 * ```typescript
 * const outcome = runMergePipeline(tables, new ExplicitPairsStrategy([
 *   { parent: '1000000003', child: '1000000004' },
 * ]))
 * outcome.ledger.size
 * ```
 */
export function runMergePipeline(
  tables: ReadonlyMap<string, Table>,
  strategy: ClassificationStrategy,
  options: RunOptions = {}
): MergeOutcome {
  const startedAt = Date.now()
  const config = options.config ?? DEFAULT_UPLOAD_CONFIG
  const logger = options.logger ?? createSilentLogger()

  assertRequiredSheets(tables.keys(), config)

  const output = new Map<string, Table>()
  for (const [name, table] of tables) {
    output.set(name, cloneTable(table))
  }
  const sheet = (name: string): Table | undefined => output.get(name)
  const requireSheet = (name: string): Table => {
    const table = sheet(name)
    if (!table) throw new MissingSheetError(name)
    return table
  }

  const processed = new Set<string>([
    ...requiredSheetNames(config),
    ...OPTIONAL_SHEET_KEYS.map((key) => config.sheets[key]),
  ])
  for (const name of processed) {
    const table = sheet(name)
    if (table) normalizeHeaders(table)
  }

  const baseTable = requireSheet(config.sheets.general)
  const classification = strategy.classify({
    baseTable,
    sourceColumn: findColumn(baseTable, config.sourceIdColumn),
    fallbackParentId: config.fallbackParentId,
  })
  logger.info('Identifiers classified', {
    mode: classification.mode,
    identifiers: classification.registry.size,
  })

  const roleTable = requireSheet(config.sheets.role)
  const roles = annotateRoles(
    classification.registry,
    roleTable,
    findColumn(roleTable, config.sourceIdColumn)
  )

  const ledger = new MutationLedger()
  const reports: MutatorReport[] = []
  const warnings: string[] = []

  for (const mutator of createDefaultMutators()) {
    const name = config.sheets[mutator.sheet]
    const table = sheet(name)
    if (!table) {
      logger.info(`${name} not found (skipped)`)
      reports.push({ sheet: name, childRows: 0, changedCells: 0, inserted: 0, skipped: 'sheet not present' })
      continue
    }

    logger.info(`Updating ${name}`)
    const sheetLogger = createSheetLogger(name, logger)
    const context: MutationContext = { classification, ledger, config, logger: sheetLogger }
    const report = mutator.apply(table, context)
    sheetLogger.debug('Sheet updated', {
      childRows: report.childRows,
      changedCells: report.changedCells,
      inserted: report.inserted,
    })
    if (report.skipped) {
      warnings.push(`${name}: ${report.skipped}`)
    }
    reports.push(report)
  }

  const stats: MergeStats = {
    parents: classification.registry.withClassification('parent').length,
    children: classification.registry.withClassification('child').length,
    changedCells: ledger.size,
    insertedRows: reports.reduce((sum, report) => sum + report.inserted, 0),
    durationMs: Date.now() - startedAt,
  }
  logger.info('Merge complete', { ...stats })

  return { tables: output, ledger, classification, roles, reports, warnings, stats }
}
