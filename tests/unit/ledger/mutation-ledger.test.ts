import { describe, it, expect, beforeEach } from 'vitest'
import {
  MutationLedger,
  createMutationLedger,
  writeCell,
} from '../../../src/ledger/mutation-ledger.js'
import { createTable } from '../../../src/types/table.js'
import type { Table } from '../../../src/types/table.js'

describe('MutationLedger', () => {
  let ledger: MutationLedger

  beforeEach(() => {
    ledger = createMutationLedger()
  })

  it('records each cell once', () => {
    expect(ledger.record('LFA1', 0, 'NAME1')).toBe(true)
    expect(ledger.record('LFA1', 0, 'NAME1')).toBe(false)
    expect(ledger.size).toBe(1)
    expect(ledger.has('LFA1', 0, 'NAME1')).toBe(true)
    expect(ledger.has('LFA1', 1, 'NAME1')).toBe(false)
  })

  it('lists entries grouped by table', () => {
    ledger.record('LFA1', 1, 'NAME1')
    ledger.record('BUT000', 0, 'XDELE')
    ledger.record('LFA1', 1, 'LOEVM')

    expect(ledger.entries()).toEqual([
      { table: 'LFA1', row: 1, column: 'NAME1' },
      { table: 'LFA1', row: 1, column: 'LOEVM' },
      { table: 'BUT000', row: 0, column: 'XDELE' },
    ])
    expect(ledger.tables()).toEqual(['LFA1', 'BUT000'])
  })

  it('reports changed columns and rows per table', () => {
    ledger.record('LFA1', 0, 'NAME1')
    ledger.record('LFA1', 2, 'NAME1')
    ledger.record('LFA1', 2, 'LOEVM')

    expect(ledger.changedColumns('LFA1')).toEqual(new Set(['NAME1', 'LOEVM']))
    expect(ledger.changedRowCount('LFA1')).toBe(2)
    expect(ledger.changedColumns('missing').size).toBe(0)
    expect(ledger.forTable('missing')).toEqual([])
  })
})

describe('writeCell', () => {
  let table: Table
  let ledger: MutationLedger

  beforeEach(() => {
    table = createTable('LFA1', ['NAME1', 'NAME2'], [{ NAME1: 'Child', NAME2: '  ' }])
    ledger = new MutationLedger()
  })

  it('writes and records a changed value', () => {
    expect(writeCell(table, 0, 'NAME1', 'COMMON SUPPLIER 1000000003', ledger)).toBe(true)
    expect(table.rows[0].NAME1).toBe('COMMON SUPPLIER 1000000003')
    expect(ledger.has('LFA1', 0, 'NAME1')).toBe(true)
  })

  it('does not record a blank written over whitespace', () => {
    expect(writeCell(table, 0, 'NAME2', '', ledger)).toBe(false)
    expect(ledger.size).toBe(0)
  })

  it('compares trimmed values', () => {
    table.rows[0].NAME1 = ' X '

    expect(writeCell(table, 0, 'NAME1', 'X', ledger)).toBe(false)
    expect(table.rows[0].NAME1).toBe(' X ')
  })

  it('skips a column the table lacks', () => {
    expect(writeCell(table, 0, 'NAME3', 'x', ledger)).toBe(false)
    expect(table.rows[0]).not.toHaveProperty('NAME3')
    expect(ledger.size).toBe(0)
  })

  it('skips a row out of range', () => {
    expect(writeCell(table, 5, 'NAME1', 'x', ledger)).toBe(false)
  })

  it('is idempotent', () => {
    writeCell(table, 0, 'NAME1', 'New', ledger)
    writeCell(table, 0, 'NAME1', 'New', ledger)

    expect(ledger.size).toBe(1)
  })
})
