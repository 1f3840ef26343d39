/**
 * Segment 09: Error System Tests
 *
 * Tests the consolidated error system in errors.ts:
 * NecklaceError base class, error code enum, and all error subclasses.
 */

import { describe, it, expect } from 'vitest'
import {
  NecklaceError,
  NecklaceErrorCode,
  InvalidArgumentError,
  InvalidSequenceError,
  LengthMismatchError,
} from '../src/errors'
import { generate } from '../src/generation'
import { reduce } from '../src/necklace-reduction'
import { makeSequence } from '../src/sequence'

describe('Segment 09: Error System', () => {
  describe('NecklaceError base class', () => {
    it('constructor sets code and message', () => {
      const err = new NecklaceError(NecklaceErrorCode.INVALID_ARGUMENT, 'test message')
      expect(err.code).toBe('INVALID_ARGUMENT')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      const err = new NecklaceError(NecklaceErrorCode.INVALID_SEQUENCE, 'x')
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(NecklaceError)
    })

    it('name property is NecklaceError', () => {
      expect(new NecklaceError(NecklaceErrorCode.LENGTH_MISMATCH, 'x').name).toBe('NecklaceError')
    })
  })

  describe('NecklaceErrorCode enum', () => {
    it('has exactly 3 unique code values', () => {
      const values = Object.values(NecklaceErrorCode)
      expect(values).toHaveLength(3)
      expect(new Set(values).size).toBe(3)
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(NecklaceErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  describe('subclasses', () => {
    const cases: Array<{ Cls: new (message: string) => NecklaceError; code: string; name: string }> = [
      { Cls: InvalidArgumentError, code: 'INVALID_ARGUMENT', name: 'InvalidArgumentError' },
      { Cls: InvalidSequenceError, code: 'INVALID_SEQUENCE', name: 'InvalidSequenceError' },
      { Cls: LengthMismatchError, code: 'LENGTH_MISMATCH', name: 'LengthMismatchError' },
    ]

    for (const { Cls, code, name } of cases) {
      it(`${name} carries ${code}`, () => {
        const err = new Cls('boom')
        expect(err).toBeInstanceOf(NecklaceError)
        expect(err.code).toBe(code)
        expect(err.name).toBe(name)
        expect(err.message).toBe('boom')
      })
    }
  })

  describe('thrown by operations', () => {
    it('generation throws InvalidArgumentError', () => {
      let caught: unknown
      try {
        generate(0)
      } catch (e) {
        caught = e
      }
      expect(caught).toBeInstanceOf(InvalidArgumentError)
      expect(caught instanceof NecklaceError && caught.code).toBe('INVALID_ARGUMENT')
    })

    it('parsing throws InvalidSequenceError', () => {
      expect(() => makeSequence('012')).toThrow(InvalidSequenceError)
    })

    it('reduction throws LengthMismatchError', () => {
      expect(() => reduce(['01', '011'].map(makeSequence))).toThrow(LengthMismatchError)
    })
  })
})
