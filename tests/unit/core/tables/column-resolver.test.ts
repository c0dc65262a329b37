import { describe, it, expect } from 'vitest'
import {
  ensureColumn,
  findColumn,
  foldColumnName,
  tryFindColumn,
} from '../../../../src/core/tables/column-resolver.js'
import { createTable } from '../../../../src/types/table.js'
import { MissingColumnError } from '../../../../src/utils/errors.js'

describe('column resolver', () => {
  const table = createTable('ADRC - Address', ['Source _ID', 'NAME1', 'CITY1'], [
    { 'Source _ID': '1000000003', NAME1: 'Parent', CITY1: 'Springfield' },
  ])

  it('folds case and spaces', () => {
    expect(foldColumnName('Source _ID')).toBe('source_id')
  })

  it('finds a header ignoring case and spaces', () => {
    expect(findColumn(table, 'Source_ID')).toBe('Source _ID')
    expect(findColumn(table, 'Name1')).toBe('NAME1')
  })

  it('returns undefined for an unknown header', () => {
    expect(tryFindColumn(table, 'EKORG')).toBeUndefined()
  })

  it('throws MissingColumnError naming the sheet', () => {
    expect(() => findColumn(table, 'EKORG')).toThrow(MissingColumnError)
    expect(() => findColumn(table, 'EKORG')).toThrow(
      "Column 'EKORG' not found in sheet 'ADRC - Address'"
    )
  })

  it('does not treat underscores as spaces', () => {
    expect(tryFindColumn(table, 'Source ID')).toBeUndefined()
  })

  describe('ensureColumn', () => {
    it('appends a missing column with blanks', () => {
      const target = createTable('T', ['A'], [{ A: '1' }, { A: '2' }])

      ensureColumn(target, '_ACTION_CODE')

      expect(target.columns).toEqual(['A', '_ACTION_CODE'])
      expect(target.rows.map((row) => row._ACTION_CODE)).toEqual(['', ''])
    })

    it('keeps an existing column untouched', () => {
      const target = createTable('T', ['A', 'DEFPA'], [{ A: '1', DEFPA: 'X' }])

      ensureColumn(target, 'DEFPA')

      expect(target.columns).toEqual(['A', 'DEFPA'])
      expect(target.rows[0].DEFPA).toBe('X')
    })
  })
})
