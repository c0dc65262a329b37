/**
 * Presentation rules for the output workbook: highlights, banner styling and
 * sheet/column visibility. Nothing in the merge core depends on this module.
 * @module workbook/presentation
 */

import type ExcelJS from 'exceljs'
import type { Table } from '../types/table.js'
import { columnLabel } from '../types/table.js'
import type { SheetKey, UploadConfig } from '../types/config.js'
import { OPTIONAL_SHEET_KEYS, REQUIRED_SHEET_KEYS } from '../types/config.js'
import type { MutationLedger } from '../ledger/mutation-ledger.js'
import { optionalSheetNames, requiredSheetNames } from '../core/config.js'
import { FIRST_DATA_ROW } from './workbook-writer.js'

/**
 * What the presentation pass did
 */
export interface PresentationSummary {
  /** Cells filled with the highlight colour */
  highlightedCells: number
  /** Columns with at least one highlighted cell, per sheet */
  changedColumns: Map<string, Set<string>>
  hiddenSheets: string[]
  /** Hidden column keys per sheet */
  hiddenColumns: Map<string, string[]>
}

function solidFill(hex: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb: `FF${hex}` } }
}

function thinBorder(hex: string): Partial<ExcelJS.Borders> {
  const side: Partial<ExcelJS.Border> = { style: 'thin', color: { argb: `FF${hex}` } }
  return { top: side, left: side, bottom: side, right: side }
}

/**
 * True for the identifier column header, e.g. `Source_ID` or `Source ID`
 */
export function isIdentifierHeader(label: string): boolean {
  const lower = label.toLowerCase()
  return lower.includes('source') && lower.includes('id')
}

/**
 * Applies the presentation rules to an assembled workbook.
 *
 * @param workbook - Output of `assembleWorkbook`
 * @param tables - The tables the workbook was assembled from, for column positions
 * @param ledger - Changed cells of the run
 * @param config - Sheet names and presentation settings
 */
export function applyPresentation(
  workbook: ExcelJS.Workbook,
  tables: ReadonlyMap<string, Table>,
  ledger: MutationLedger,
  config: UploadConfig
): PresentationSummary {
  const { presentation, sheets } = config
  const nameOf = (key: SheetKey) => sheets[key]
  const summary: PresentationSummary = {
    highlightedCells: 0,
    changedColumns: new Map(),
    hiddenSheets: [],
    hiddenColumns: new Map(),
  }

  // Highlights
  const highlight = solidFill(presentation.highlightColor)
  for (const { table: sheetName, row, column } of ledger.entries()) {
    const worksheet = workbook.getWorksheet(sheetName)
    const columnIndex = tables.get(sheetName)?.columns.indexOf(column) ?? -1
    if (!worksheet || columnIndex < 0) continue
    worksheet.getCell(FIRST_DATA_ROW + row, columnIndex + 1).fill = highlight
    summary.highlightedCells++
    let changed = summary.changedColumns.get(sheetName)
    if (!changed) {
      changed = new Set()
      summary.changedColumns.set(sheetName, changed)
    }
    changed.add(column)
  }

  // Sheet visibility
  const allowed = new Set([...requiredSheetNames(config), ...optionalSheetNames(config)])
  const forcedHidden = new Set(presentation.hiddenSheets.map(nameOf))
  for (const worksheet of workbook.worksheets) {
    if (!allowed.has(worksheet.name) || forcedHidden.has(worksheet.name)) {
      worksheet.state = 'hidden'
      summary.hiddenSheets.push(worksheet.name)
    }
  }

  // Column visibility
  const changedOnly = new Set(presentation.changedColumnsOnly.map(nameOf))
  const alwaysHidden = new Map<string, Set<string>>()
  for (const key of [...REQUIRED_SHEET_KEYS, ...OPTIONAL_SHEET_KEYS]) {
    const columns = presentation.hiddenColumns[key]
    if (!columns) continue
    alwaysHidden.set(
      nameOf(key),
      new Set(columns.map((column) => column.trim().toUpperCase()))
    )
  }

  for (const worksheet of workbook.worksheets) {
    const table = tables.get(worksheet.name)
    if (!table) continue
    const hidden: string[] = []
    const changed = summary.changedColumns.get(worksheet.name) ?? new Set<string>()
    const hiddenLabels = alwaysHidden.get(worksheet.name)

    table.columns.forEach((column, index) => {
      const label = columnLabel(table, column).trim()
      if (label === '') return
      let hide: boolean
      if (changedOnly.has(worksheet.name)) {
        hide = !changed.has(column) && !isIdentifierHeader(label)
      } else if (hiddenLabels) {
        hide = hiddenLabels.has(label.toUpperCase())
        if (!hide) return
      } else {
        hide = false
      }
      worksheet.getColumn(index + 1).hidden = hide
      if (hide) hidden.push(column)
    })

    if (hidden.length > 0) {
      summary.hiddenColumns.set(worksheet.name, hidden)
    }
  }

  // Banner rows
  const bannerFill = solidFill(presentation.bannerColor)
  const bannerBorder = thinBorder(presentation.bannerBorderColor)
  for (const worksheet of workbook.worksheets) {
    const width = worksheet.columnCount
    for (let rowNumber = 1; rowNumber <= presentation.bannerRows; rowNumber++) {
      for (let column = 1; column <= width; column++) {
        const cell = worksheet.getCell(rowNumber, column)
        cell.border = bannerBorder
        cell.fill = bannerFill
      }
    }
  }

  return summary
}
