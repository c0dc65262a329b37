import type { Command } from 'commander'
import chalk from 'chalk'
import { CommonSupplier } from '../../builder/upload-builder.js'
import type { UploadProcessor, UploadResult } from '../../processor/upload-processor.js'
import type { MergePair } from '../../types/identity.js'
import { ConfigurationError } from '../../utils/errors.js'
import { createConsoleLogger, createSilentLogger, type Logger } from '../../utils/logger.js'
import { error, field, heading, success, warn } from '../format.js'
import { collectPair, loadPairsFile } from '../pairs.js'

export const DEFAULT_OUTPUT_FILE = 'UploadFile.xlsx'

export interface ProcessOptions {
  output: string
  pair?: MergePair[]
  pairsFile?: string
  positional?: boolean
  skipValidation?: boolean
  quiet?: boolean
  verbose?: boolean
}

function commandLogger(opts: ProcessOptions): Logger {
  if (opts.quiet) return createSilentLogger()
  return createConsoleLogger({ level: opts.verbose ? 'debug' : 'info' })
}

/**
 * Builds a processor from command options. Exactly one of `--pair`,
 * `--pairs-file` or `--positional` must be given.
 */
export async function createProcessor(opts: ProcessOptions): Promise<UploadProcessor> {
  const modes = [opts.pair !== undefined, opts.pairsFile !== undefined, opts.positional === true]
  const chosen = modes.filter(Boolean).length
  if (chosen !== 1) {
    throw new ConfigurationError(
      'Choose exactly one of --pair, --pairs-file or --positional',
      'mode'
    )
  }

  const builder = CommonSupplier.create()
    .logger(commandLogger(opts))
    .validatePairs(!opts.skipValidation)

  if (opts.positional) {
    builder.positional()
  } else {
    const pairs = opts.pairsFile ? await loadPairsFile(opts.pairsFile) : opts.pair ?? []
    builder.pairs(pairs)
  }
  return builder.build()
}

function printSummary(result: UploadResult, output: string): void {
  const { outcome, presentation } = result
  heading('Common supplier merge')
  field('Parents', outcome.stats.parents)
  field('Children', outcome.stats.children)
  field('Changed cells', outcome.stats.changedCells)
  field('Inserted associations', outcome.stats.insertedRows)
  field('Highlighted cells', presentation.highlightedCells)

  heading('Sheets')
  for (const report of outcome.reports) {
    if (report.skipped) {
      field(report.sheet, chalk.dim(`skipped (${report.skipped})`))
      continue
    }
    const inserted = report.inserted > 0 ? `, ${report.inserted} inserted` : ''
    field(report.sheet, `${report.childRows} child rows, ${report.changedCells} cells${inserted}`)
  }

  for (const message of outcome.warnings) {
    warn(message)
  }
  console.log()
  success(`Upload file written to ${output}`)
}

export function registerProcessCommand(program: Command): void {
  program
    .command('process <input>')
    .description('Merge child suppliers into their parents and write the upload workbook')
    .option('-o, --output <file>', 'Output workbook', DEFAULT_OUTPUT_FILE)
    .option('-p, --pair <parent:child>', 'Parent/child pair (repeatable)', collectPair)
    .option('--pairs-file <file>', 'JSON file with [{ "parent", "child" }] entries')
    .option('--positional', 'Derive parents from the 4th identifier digit')
    .option('--skip-validation', 'Skip the pair format and existence check')
    .option('-q, --quiet', 'Only print the summary')
    .option('-v, --verbose', 'Also print debug messages')
    .action(async (input: string, opts: ProcessOptions) => {
      try {
        const processor = await createProcessor(opts)
        const result = await processor.processFile(input, opts.output)
        printSummary(result, opts.output)
      } catch (err) {
        error(err instanceof Error ? err.message : String(err))
        process.exitCode = 1
      }
    })
}
