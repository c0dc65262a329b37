/**
 * Assembles processed tables into an output workbook
 * @module workbook/workbook-writer
 */

import { writeFile } from 'node:fs/promises'
import ExcelJS from 'exceljs'
import type { Table } from '../types/table.js'
import { columnLabel } from '../types/table.js'
import { WorkbookIOError } from '../utils/errors.js'
import { HEADER_ROW, PREAMBLE_ROW, errorMessage } from './workbook-reader.js'

/** 1-based row of the first data row in the output */
export const FIRST_DATA_ROW = HEADER_ROW + 1

function toCell(text: string): string | null {
  return text === '' ? null : text
}

/**
 * Builds a workbook with one worksheet per table, in map order: the preamble
 * on row 1, header labels on row 2, data from row 3. Cells are written as text.
 *
 * @param tables - Processed tables keyed by sheet name
 * @param preambles - Original first rows keyed by sheet name
 */
export function assembleWorkbook(
  tables: ReadonlyMap<string, Table>,
  preambles: ReadonlyMap<string, readonly string[]>
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook()

  for (const [name, table] of tables) {
    const worksheet = workbook.addWorksheet(name)

    const preamble = preambles.get(name) ?? []
    const preambleRow = worksheet.getRow(PREAMBLE_ROW)
    preamble.forEach((text, index) => {
      preambleRow.getCell(index + 1).value = toCell(text)
    })

    const headerRow = worksheet.getRow(HEADER_ROW)
    table.columns.forEach((column, index) => {
      headerRow.getCell(index + 1).value = toCell(columnLabel(table, column))
    })

    table.rows.forEach((row, rowIndex) => {
      const dataRow = worksheet.getRow(FIRST_DATA_ROW + rowIndex)
      table.columns.forEach((column, index) => {
        dataRow.getCell(index + 1).value = toCell(row[column] ?? '')
      })
    })
  }

  return workbook
}

/**
 * Serializes a workbook to bytes
 *
 * @throws {WorkbookIOError} If serialization fails
 */
export async function writeWorkbook(workbook: ExcelJS.Workbook): Promise<Uint8Array> {
  try {
    return new Uint8Array(await workbook.xlsx.writeBuffer())
  } catch (error) {
    throw new WorkbookIOError('write', errorMessage(error), { cause: error })
  }
}

/**
 * Writes workbook bytes to a file
 *
 * @throws {WorkbookIOError} If the file cannot be written
 */
export async function writeWorkbookFile(path: string, bytes: Uint8Array): Promise<void> {
  try {
    await writeFile(path, bytes)
  } catch (error) {
    throw new WorkbookIOError('write', `${errorMessage(error)}. Close the file if it is open elsewhere`, {
      file: path,
      cause: error,
    })
  }
}
