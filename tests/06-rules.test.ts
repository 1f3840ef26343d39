/**
 * Segment 06: Cycle Rules
 *
 * Defaults, validation and scalar-or-set normalisation of constraint options.
 */

import { describe, it, expect } from 'vitest'
import {
  METONIC_RULES,
  normalizeCounts,
  resolveRules,
  InvalidArgumentError,
} from '../src/rules'

describe('Segment 06: Cycle Rules', () => {
  describe('defaults', () => {
    it('METONIC_RULES describes the classical cycle', () => {
      expect(METONIC_RULES).toEqual({
        length: 19,
        intercalaryCount: 7,
        maxIntercalaryRun: 1,
        maxOrdinaryRun: 2,
      })
    })

    it('METONIC_RULES is frozen', () => {
      expect(Object.isFrozen(METONIC_RULES)).toBe(true)
    })

    it('resolveRules with no options yields the Metonic constraint set', () => {
      const rules = resolveRules()
      expect(rules.n).toBe(19)
      expect([...rules.allowedCounts]).toEqual([7])
      expect(rules.maxI).toBe(1)
      expect(rules.maxO).toBe(2)
    })

    it('explicit undefined falls back to the default', () => {
      expect(resolveRules({ length: undefined }).n).toBe(19)
    })

    it('the resolved set is frozen', () => {
      expect(Object.isFrozen(resolveRules())).toBe(true)
    })
  })

  describe('overrides', () => {
    it('merges partial options over the defaults', () => {
      const rules = resolveRules({ length: 5, maxOrdinaryRun: 4 })
      expect(rules.n).toBe(5)
      expect(rules.maxO).toBe(4)
      expect(rules.maxI).toBe(1)
    })

    it('accepts several intercalary counts', () => {
      expect([...resolveRules({ intercalaryCount: [6, 7] }).allowedCounts]).toEqual([6, 7])
    })

    it('accepts zero run bounds', () => {
      expect(resolveRules({ maxIntercalaryRun: 0 }).maxI).toBe(0)
    })
  })

  describe('normalizeCounts', () => {
    it('wraps a scalar into a one-element set', () => {
      const counts = normalizeCounts(3)
      expect(counts.size).toBe(1)
      expect(counts.has(3)).toBe(true)
    })

    it('deduplicates an iterable', () => {
      expect([...normalizeCounts([2, 2, 3])]).toEqual([2, 3])
    })

    it('accepts zero', () => {
      expect(normalizeCounts(0).has(0)).toBe(true)
    })

    it('rejects an empty iterable', () => {
      expect(() => normalizeCounts([])).toThrow('intercalaryCount must name at least one count')
    })

    it('rejects negative or fractional counts', () => {
      expect(() => normalizeCounts(-1)).toThrow('intercalaryCount must be >= 0, got -1')
      expect(() => normalizeCounts([1, 2.5])).toThrow(InvalidArgumentError)
    })
  })

  describe('validation', () => {
    it('rejects a length below 1', () => {
      expect(() => resolveRules({ length: 0 })).toThrow('length must be >= 1, got 0')
    })

    it('rejects negative run bounds', () => {
      expect(() => resolveRules({ maxIntercalaryRun: -1 })).toThrow(
        'maxIntercalaryRun must be >= 0, got -1'
      )
      expect(() => resolveRules({ maxOrdinaryRun: -2 })).toThrow(
        'maxOrdinaryRun must be >= 0, got -2'
      )
    })

    it('rejects fractional values', () => {
      expect(() => resolveRules({ length: 4.2 })).toThrow('length must be an integer, got 4.2')
    })
  })
})
