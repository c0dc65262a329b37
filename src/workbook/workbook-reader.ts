/**
 * Reads an extract workbook into text tables
 * @module workbook/workbook-reader
 */

import { readFile } from 'node:fs/promises'
import ExcelJS from 'exceljs'
import type { Row, Sheet, SheetSet, Table } from '../types/table.js'
import { EMPTY_HEADER_PREFIX, uniqueColumnKey } from '../types/table.js'
import { WorkbookIOError } from '../utils/errors.js'

/** 1-based row holding the opaque preamble */
export const PREAMBLE_ROW = 1

/** 1-based row holding the real headers */
export const HEADER_ROW = 2

/**
 * Renders a cell value as text. Nothing is coerced to numbers or dates:
 * numbers keep their plain string form and dates become `YYYY-MM-DD`.
 */
export function cellValueToText(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (value instanceof Date) return value.toISOString().slice(0, 10)
  if ('richText' in value) return value.richText.map((part) => part.text).join('')
  if ('hyperlink' in value) return cellValueToText(value.text)
  if ('error' in value) return value.error
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result
    if (result === undefined) return ''
    if (typeof result === 'object' && !(result instanceof Date)) return result.error
    return cellValueToText(result)
  }
  return ''
}

function rowTexts(worksheet: ExcelJS.Worksheet, rowNumber: number, width: number): string[] {
  const row = worksheet.getRow(rowNumber)
  const texts: string[] = []
  for (let column = 1; column <= width; column++) {
    texts.push(cellValueToText(row.getCell(column).value))
  }
  return texts
}

/**
 * Widest row from the header row down. Data cells right of the last header
 * still get a column.
 */
function tableWidth(worksheet: ExcelJS.Worksheet): number {
  let width = 0
  for (let rowNumber = HEADER_ROW; rowNumber <= worksheet.rowCount; rowNumber++) {
    width = Math.max(width, worksheet.getRow(rowNumber).cellCount)
  }
  return width
}

/**
 * Converts one worksheet into a sheet: row 1 as preamble, row 2 as header,
 * everything below as data. Trailing blank rows are dropped.
 */
export function worksheetToSheet(worksheet: ExcelJS.Worksheet): Sheet {
  const preamble = rowTexts(worksheet, PREAMBLE_ROW, worksheet.getRow(PREAMBLE_ROW).cellCount)
  const headerTexts = rowTexts(worksheet, HEADER_ROW, tableWidth(worksheet))

  const taken = new Set<string>()
  const labels: Record<string, string> = {}
  const columns = headerTexts.map((header, index) => {
    if (header.trim() === '') {
      return uniqueColumnKey(`${EMPTY_HEADER_PREFIX}_${index}`, taken)
    }
    const key = uniqueColumnKey(header, taken)
    if (key !== header) labels[key] = header
    return key
  })

  const rows: Row[] = []
  let lastFilled = -1
  for (let rowNumber = HEADER_ROW + 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const texts = rowTexts(worksheet, rowNumber, columns.length)
    const row: Row = {}
    columns.forEach((column, index) => {
      row[column] = texts[index]
    })
    rows.push(row)
    if (texts.some((text) => text.trim() !== '')) {
      lastFilled = rows.length - 1
    }
  }

  const table: Table = {
    name: worksheet.name,
    columns,
    rows: rows.slice(0, lastFilled + 1),
  }
  if (Object.keys(labels).length > 0) {
    table.labels = labels
  }
  return { preamble, table }
}

/**
 * Copies the bytes into a standalone ArrayBuffer
 */
export function toArrayBuffer(bytes: Uint8Array | ArrayBuffer): ArrayBuffer {
  if (bytes instanceof ArrayBuffer) return bytes
  const copy = new Uint8Array(bytes.byteLength)
  copy.set(bytes)
  return copy.buffer
}

/**
 * Loads a workbook from bytes, every sheet in workbook order.
 *
 * @throws {WorkbookIOError} If the bytes are not a readable workbook
 */
export async function readWorkbook(
  bytes: Uint8Array | ArrayBuffer,
  file?: string
): Promise<SheetSet> {
  const workbook = new ExcelJS.Workbook()
  try {
    await workbook.xlsx.load(toArrayBuffer(bytes))
  } catch (error) {
    throw new WorkbookIOError('read', errorMessage(error), { file, cause: error })
  }

  const sheets: SheetSet = new Map()
  for (const worksheet of workbook.worksheets) {
    sheets.set(worksheet.name, worksheetToSheet(worksheet))
  }
  return sheets
}

/**
 * Reads and loads a workbook file
 *
 * @throws {WorkbookIOError} If the file cannot be read or parsed
 */
export async function readWorkbookFile(path: string): Promise<SheetSet> {
  let bytes: Uint8Array
  try {
    bytes = await readFile(path)
  } catch (error) {
    throw new WorkbookIOError('read', errorMessage(error), { file: path, cause: error })
  }
  return readWorkbook(bytes, path)
}

/**
 * Tables of a sheet set, keyed by sheet name
 */
export function tablesOf(sheets: SheetSet): Map<string, Table> {
  const tables = new Map<string, Table>()
  for (const [name, sheet] of sheets) {
    tables.set(name, sheet.table)
  }
  return tables
}

/**
 * Preamble rows of a sheet set, keyed by sheet name
 */
export function preamblesOf(sheets: SheetSet): Map<string, string[]> {
  const preambles = new Map<string, string[]>()
  for (const [name, sheet] of sheets) {
    preambles.set(name, sheet.preamble)
  }
  return preambles
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
