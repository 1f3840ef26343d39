/**
 * Sequence Model
 *
 * Branded binary sequences plus the display conversions used by callers.
 * A sequence is a string over the two-symbol alphabet: '0' for an ordinary
 * year, '1' for an intercalary year.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __sequence: unique symbol

/** Non-empty string of '0' and '1' */
export type Sequence = string & { readonly [__sequence]: true }

export type YearSymbol = '0' | '1'

export const ORDINARY: YearSymbol = '0'
export const INTERCALARY: YearSymbol = '1'

// ============================================================================
// Errors
// ============================================================================

export { InvalidSequenceError } from './errors'
import { InvalidSequenceError } from './errors'

// ============================================================================
// Parsing
// ============================================================================

const SEQUENCE_PATTERN = /^[01]+$/
const DISPLAY_PATTERN = /^[OI]+$/

export function isSymbol(value: string): value is YearSymbol {
  return value === ORDINARY || value === INTERCALARY
}

export function parseSequence(str: string): Result<Sequence, InvalidSequenceError> {
  if (str.length === 0) return Err(new InvalidSequenceError('Sequence must not be empty'))
  if (!SEQUENCE_PATTERN.test(str))
    return Err(new InvalidSequenceError(`Sequence may only contain '0' and '1': '${str}'`))
  return Ok(str as Sequence)
}

export function makeSequence(str: string): Sequence {
  const r = parseSequence(str)
  if (!r.ok) throw r.error
  return r.value
}

export function fromInts(ints: readonly number[]): Sequence {
  for (const i of ints) {
    if (i !== 0 && i !== 1) throw new InvalidSequenceError(`Expected 0 or 1, got ${i}`)
  }
  return makeSequence(ints.join(''))
}

export function fromDisplayString(str: string): Result<Sequence, InvalidSequenceError> {
  if (!DISPLAY_PATTERN.test(str))
    return Err(new InvalidSequenceError(`Display string may only contain 'O' and 'I': '${str}'`))
  return parseSequence(str.replace(/O/g, '0').replace(/I/g, '1'))
}

// ============================================================================
// Counting
// ============================================================================

export function countSymbol(sequence: Sequence, symbol: YearSymbol): number {
  let count = 0
  for (const ch of sequence) {
    if (ch === symbol) count++
  }
  return count
}

export function intercalaryCount(sequence: Sequence): number {
  return countSymbol(sequence, INTERCALARY)
}

// ============================================================================
// Display
// ============================================================================

/** 'O' for ordinary, 'I' for intercalary */
export function asString(sequence: Sequence): string {
  return sequence.replace(/0/g, 'O').replace(/1/g, 'I')
}

export function asInts(sequence: Sequence): Array<0 | 1> {
  return Array.from(sequence, (ch): 0 | 1 => (ch === INTERCALARY ? 1 : 0))
}
