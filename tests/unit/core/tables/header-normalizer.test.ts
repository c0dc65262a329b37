import { describe, it, expect } from 'vitest'
import {
  normalizeHeader,
  normalizeHeaders,
} from '../../../../src/core/tables/header-normalizer.js'
import { createTable } from '../../../../src/types/table.js'

describe('normalizeHeader', () => {
  it('trims whitespace', () => {
    expect(normalizeHeader('  NAME1 ')).toBe('NAME1')
  })

  it('replaces non-breaking spaces', () => {
    expect(normalizeHeader('Source\u00A0ID\u00A0')).toBe('Source ID')
  })
})

describe('normalizeHeaders', () => {
  it('renames columns and row keys together', () => {
    const table = createTable('T', [' Source_ID', 'NAME1\u00A0'], [
      { ' Source_ID': '1000000003', 'NAME1\u00A0': 'Parent' },
    ])

    normalizeHeaders(table)

    expect(table.columns).toEqual(['Source_ID', 'NAME1'])
    expect(table.rows).toEqual([{ Source_ID: '1000000003', NAME1: 'Parent' }])
  })

  it('suffixes headers that collide after normalization', () => {
    const table = createTable('T', ['NAME1', ' NAME1'], [{ NAME1: 'a', ' NAME1': 'b' }])

    normalizeHeaders(table)

    expect(table.columns).toEqual(['NAME1', 'NAME1_1'])
    expect(table.rows[0]).toEqual({ NAME1: 'a', NAME1_1: 'b' })
    expect(table.labels).toEqual({ NAME1_1: 'NAME1' })
  })

  it('normalizes kept labels along with keys', () => {
    const table = createTable('T', ['NAME1', 'NAME1_1'], [{ NAME1: 'a', NAME1_1: 'b' }])
    table.labels = { NAME1_1: ' NAME1 ' }

    normalizeHeaders(table)

    expect(table.columns).toEqual(['NAME1', 'NAME1_1'])
    expect(table.labels).toEqual({ NAME1_1: 'NAME1' })
  })

  it('adds no labels when headers are already clean', () => {
    const table = createTable('T', ['Source_ID', '__EMPTY_1'])

    normalizeHeaders(table)

    expect(table.labels).toBeUndefined()
  })

  it('is idempotent', () => {
    const table = createTable('T', [' A '], [{ ' A ': 'x' }])

    normalizeHeaders(table)
    const rows = table.rows
    normalizeHeaders(table)

    expect(table.columns).toEqual(['A'])
    expect(table.rows).toBe(rows)
  })
})
