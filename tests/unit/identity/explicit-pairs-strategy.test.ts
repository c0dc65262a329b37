import { describe, it, expect } from 'vitest'
import { ExplicitPairsStrategy } from '../../../src/identity/explicit-pairs-strategy.js'
import { ConfigurationError, PairConflictError } from '../../../src/utils/errors.js'
import { CHILD, OTHER, PARENT, createGeneralTable } from '../../fixtures/extract.js'

function classify(pairs: Array<{ parent: string; child: string }>) {
  return new ExplicitPairsStrategy(pairs).classify({
    baseTable: createGeneralTable(),
    sourceColumn: 'Source_ID',
    fallbackParentId: '0000000000',
  })
}

describe('ExplicitPairsStrategy', () => {
  it('classifies parents and children', () => {
    const classification = classify([{ parent: PARENT, child: CHILD }])

    expect(classification.mode).toBe('explicit-pairs')
    expect(classification.registry.isParent(PARENT)).toBe(true)
    expect(classification.registry.isChild(CHILD)).toBe(true)
    expect(classification.registry.has(OTHER)).toBe(false)
    expect(classification.identityMap.get(CHILD)).toBe(PARENT)
    expect(classification.flagsNonChildReports).toBe(true)
  })

  it('merges several groups in one run', () => {
    const classification = classify([
      { parent: PARENT, child: CHILD },
      { parent: '2000000003', child: '2000000004' },
      { parent: PARENT, child: '1000000005' },
    ])

    expect(classification.parentOf(CHILD)).toBe(PARENT)
    expect(classification.parentOf('2000000004')).toBe('2000000003')
    expect(classification.parentOf('1000000005')).toBe(PARENT)
    expect(classification.registry.withClassification('parent')).toEqual([
      PARENT,
      '2000000003',
    ])
  })

  it('resolves unmapped identifiers to the fallback parent', () => {
    expect(classify([{ parent: PARENT, child: CHILD }]).parentOf(OTHER)).toBe('0000000000')
  })

  it('trims identifiers', () => {
    const strategy = new ExplicitPairsStrategy([{ parent: ` ${PARENT}`, child: `${CHILD} ` }])

    expect(strategy.getPairs()).toEqual([{ parent: PARENT, child: CHILD }])
  })

  it('accepts a repeated pair', () => {
    const classification = classify([
      { parent: PARENT, child: CHILD },
      { parent: PARENT, child: CHILD },
    ])

    expect(classification.registry.size).toBe(2)
  })

  it('requires at least one pair', () => {
    expect(() => new ExplicitPairsStrategy([])).toThrow(ConfigurationError)
  })

  describe('conflicts', () => {
    it('rejects merging an identifier into itself', () => {
      expect(() => classify([{ parent: PARENT, child: PARENT }])).toThrow(
        `Conflicting pairs for identifier '${PARENT}': pair #1 merges the identifier into itself`
      )
    })

    it('rejects a child with two parents', () => {
      expect(() =>
        classify([
          { parent: PARENT, child: CHILD },
          { parent: OTHER, child: CHILD },
        ])
      ).toThrow(
        `Conflicting pairs for identifier '${CHILD}': pair #2 maps it to '${OTHER}' but it is already a child of '${PARENT}'`
      )
    })

    it('rejects a child used later as a parent', () => {
      expect(() =>
        classify([
          { parent: PARENT, child: CHILD },
          { parent: CHILD, child: OTHER },
        ])
      ).toThrow(
        `Conflicting pairs for identifier '${CHILD}': pair #2 uses it as a parent but it is a child of '${PARENT}'`
      )
    })

    it('rejects a parent used later as a child', () => {
      let caught: unknown
      try {
        classify([
          { parent: PARENT, child: CHILD },
          { parent: OTHER, child: PARENT },
        ])
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(PairConflictError)
      expect(caught).toMatchObject({ identifier: PARENT, code: 'PAIR_CONFLICT' })
    })
  })
})
