import { describe, it, expect, beforeEach } from 'vitest'
import type ExcelJS from 'exceljs'
import {
  applyPresentation,
  isIdentifierHeader,
  type PresentationSummary,
} from '../../../src/workbook/presentation.js'
import { assembleWorkbook } from '../../../src/workbook/workbook-writer.js'
import { runMergePipeline } from '../../../src/pipeline/merge-pipeline.js'
import { ExplicitPairsStrategy } from '../../../src/identity/explicit-pairs-strategy.js'
import { DEFAULT_UPLOAD_CONFIG } from '../../../src/types/config.js'
import { createTable } from '../../../src/types/table.js'
import { CHILD, PARENT, SHEETS, createExtractTables } from '../../fixtures/extract.js'

function requireWorksheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const worksheet = workbook.getWorksheet(name)
  if (!worksheet) throw new Error(`missing ${name}`)
  return worksheet
}

describe('isIdentifierHeader', () => {
  it('matches headers mentioning source and id', () => {
    expect(isIdentifierHeader('Source_ID')).toBe(true)
    expect(isIdentifierHeader('source id')).toBe(true)
    expect(isIdentifierHeader('NAME_ORG1')).toBe(false)
  })
})

describe('applyPresentation', () => {
  let workbook: ExcelJS.Workbook
  let summary: PresentationSummary

  beforeEach(() => {
    const input = createExtractTables()
    input.set('Notes', createTable('Notes', ['Text'], [{ Text: 'keep' }]))
    const outcome = runMergePipeline(
      input,
      new ExplicitPairsStrategy([{ parent: PARENT, child: CHILD }])
    )
    workbook = assembleWorkbook(outcome.tables, new Map())
    summary = applyPresentation(workbook, outcome.tables, outcome.ledger, DEFAULT_UPLOAD_CONFIG)
  })

  it('highlights every changed cell', () => {
    const general = requireWorksheet(workbook, SHEETS.general)

    expect(summary.highlightedCells).toBe(25)
    expect(general.getCell(4, 2).fill).toEqual({
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFFFFF00' },
    })
    expect(general.getCell(3, 2).fill).toBeUndefined()
  })

  it('hides the role sheet and unknown sheets', () => {
    expect(summary.hiddenSheets).toEqual([SHEETS.role, 'Notes'])
    expect(requireWorksheet(workbook, SHEETS.role).state).toBe('hidden')
    expect(requireWorksheet(workbook, SHEETS.general).state).toBe('visible')
  })

  it('keeps only changed and identifier columns on name sheets', () => {
    expect(summary.hiddenColumns.get(SHEETS.general)).toEqual([
      'NAME_ORG3',
      'NAME_ORG4',
      'MC_NAME3',
      'MC_NAME4',
    ])
    expect(summary.hiddenColumns.get(SHEETS.address)).toEqual(['CITY1'])

    const general = requireWorksheet(workbook, SHEETS.general)
    expect(general.getColumn(1).hidden).toBe(false)
    expect(general.getColumn(4).hidden).toBe(true)
  })

  it('hides audit columns on the partner function sheet', () => {
    expect(summary.hiddenColumns.get(SHEETS.partnerFunction)).toEqual(['LIFNR', 'ERNAM'])
    expect(requireWorksheet(workbook, SHEETS.partnerFunction).getColumn(3).hidden).toBe(false)
  })

  it('leaves other sheets fully visible', () => {
    expect(summary.hiddenColumns.has(SHEETS.supplierGeneral)).toBe(false)
    expect(summary.hiddenColumns.has(SHEETS.companyCode)).toBe(false)
  })

  it('styles the banner rows', () => {
    const cell = requireWorksheet(workbook, SHEETS.companyCode).getCell(2, 3)

    expect(cell.fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFDBD5BF' } })
    expect(cell.border.top).toEqual({ style: 'thin', color: { argb: 'FF000000' } })
  })

  it('lists changed columns per sheet', () => {
    expect(summary.changedColumns.get(SHEETS.companyCode)).toEqual(
      new Set(['_ACTION_CODE', 'Source_ID'])
    )
  })
})
