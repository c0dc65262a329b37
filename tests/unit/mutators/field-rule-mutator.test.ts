import { describe, it, expect } from 'vitest'
import {
  AddressMutator,
  GeneralMutator,
  SupplierGeneralMutator,
} from '../../../src/mutators/field-rule-mutator.js'
import { commonSupplierName } from '../../../src/mutators/field-rules.js'
import { PositionalStrategy } from '../../../src/identity/positional-strategy.js'
import { createTable } from '../../../src/types/table.js'
import { MissingColumnError } from '../../../src/utils/errors.js'
import {
  CHILD,
  GENERAL_COLUMNS,
  OTHER,
  PARENT,
  createAddressTable,
  createContext,
  createGeneralTable,
  createSupplierGeneralTable,
} from '../../fixtures/extract.js'

const MERGED_NAME = 'COMMON SUPPLIER 1000000003'

describe('commonSupplierName', () => {
  it('joins prefix and parent', () => {
    expect(commonSupplierName('COMMON SUPPLIER ', PARENT)).toBe(MERGED_NAME)
  })
})

describe('GeneralMutator', () => {
  it('clears, fills and renames child rows', () => {
    const table = createGeneralTable()
    const context = createContext()

    new GeneralMutator().apply(table, context)

    expect(table.rows[1]).toMatchObject({
      Source_ID: CHILD,
      NAME_ORG1: MERGED_NAME,
      NAME_ORG2: '',
      MC_NAME1: MERGED_NAME,
      MC_NAME2: '',
      ZGSTS_SLP_REP_FLG: '',
      ZGSTS_AVN_REP_FLG: 'X',
      XDELE: 'X',
    })
  })

  it('sets report flags on non-child rows with explicit pairs', () => {
    const table = createGeneralTable()
    const context = createContext()

    const report = new GeneralMutator().apply(table, context)

    for (const index of [0, 2]) {
      expect(table.rows[index].ZGSTS_CMT_REP_FLG).toBe('X')
      expect(table.rows[index].ZGSTS_ATL_REP_FLG).toBe('X')
    }
    expect(table.rows[1].ZGSTS_CMT_REP_FLG).toBe('')
    expect(report).toEqual({
      sheet: 'BUT000 - General',
      childRows: 1,
      changedCells: 11,
      inserted: 0,
    })
  })

  it('leaves the parent row names alone', () => {
    const table = createGeneralTable()

    new GeneralMutator().apply(table, createContext())

    expect(table.rows[0].NAME_ORG1).toBe('Parent Supplies')
    expect(table.rows[0].MC_NAME1).toBe('PARENT SUPPLIES')
  })

  it('sets no report flags in positional mode', () => {
    const table = createTable('BUT000 - General', GENERAL_COLUMNS, [
      { Source_ID: '2003000001', NAME_ORG1: 'Parent' },
      { Source_ID: '2001000001', NAME_ORG1: 'Child' },
    ])
    const classification = new PositionalStrategy().classify({
      baseTable: table,
      sourceColumn: 'Source_ID',
      fallbackParentId: '0000000000',
    })

    new GeneralMutator().apply(table, createContext(classification))

    expect(table.rows[0].ZGSTS_CMT_REP_FLG).toBe('')
    expect(table.rows[1].NAME_ORG1).toBe('COMMON SUPPLIER 2003000001')
  })

  it('skips rule columns the sheet does not have', () => {
    const table = createTable('BUT000 - General', ['Source_ID', 'NAME_ORG1'], [
      { Source_ID: CHILD, NAME_ORG1: 'Child' },
    ])
    const context = createContext()

    new GeneralMutator().apply(table, context)

    expect(table.columns).toEqual(['Source_ID', 'NAME_ORG1'])
    expect(table.rows[0].NAME_ORG1).toBe(MERGED_NAME)
    expect(context.ledger.size).toBe(1)
  })

  it('requires the identifier column', () => {
    const table = createTable('BUT000 - General', ['NAME_ORG1'])

    expect(() => new GeneralMutator().apply(table, createContext())).toThrow(MissingColumnError)
  })

  it('records nothing on a second run', () => {
    const table = createGeneralTable()
    new GeneralMutator().apply(table, createContext())
    const context = createContext()

    const report = new GeneralMutator().apply(table, context)

    expect(report.changedCells).toBe(0)
    expect(context.ledger.size).toBe(0)
  })
})

describe('AddressMutator', () => {
  it('renames the name line of child rows only', () => {
    const table = createAddressTable()
    const context = createContext()

    const report = new AddressMutator().apply(table, context)

    expect(table.rows[1].Name1).toBe(MERGED_NAME)
    expect(table.rows[1].CITY1).toBe('Shelbyville')
    expect(table.rows[0].Name1).toBe('Parent Supplies')
    expect(report.changedCells).toBe(1)
  })

  it('resolves the name column ignoring case', () => {
    const table = createTable('ADRC - Address', ['source_id', 'NAME1'], [
      { source_id: CHILD, NAME1: 'Child' },
    ])

    new AddressMutator().apply(table, createContext())

    expect(table.rows[0].NAME1).toBe(MERGED_NAME)
  })

  it('fails without a name column', () => {
    const table = createTable('ADRC - Address', ['Source_ID', 'CITY1'])

    expect(() => new AddressMutator().apply(table, createContext())).toThrow(
      "Column 'Name1' not found in sheet 'ADRC - Address'"
    )
  })
})

describe('SupplierGeneralMutator', () => {
  it('applies supplier rules to child rows', () => {
    const table = createSupplierGeneralTable()
    const context = createContext()

    const report = new SupplierGeneralMutator().apply(table, context)

    expect(table.rows[1]).toEqual({
      Source_ID: CHILD,
      NAME1: MERGED_NAME,
      NAME2: '',
      NAME3: '',
      NAME4: '',
      LOEVM: 'X',
      SPERR: 'X',
      SPERM: 'X',
    })
    expect(table.rows[0].LOEVM).toBe('')
    expect(report.changedCells).toBe(5)
  })
})

describe('rename symmetry', () => {
  it('writes the same name on every sheet', () => {
    const context = createContext()
    const general = createGeneralTable()
    const address = createAddressTable()
    const supplier = createSupplierGeneralTable()

    new GeneralMutator().apply(general, context)
    new AddressMutator().apply(address, context)
    new SupplierGeneralMutator().apply(supplier, context)

    expect(
      new Set([
        general.rows[1].NAME_ORG1,
        general.rows[1].MC_NAME1,
        address.rows[1].Name1,
        supplier.rows[1].NAME1,
      ])
    ).toEqual(new Set([MERGED_NAME]))
    expect(general.rows[2].Source_ID).toBe(OTHER)
  })
})
