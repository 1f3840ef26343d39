/**
 * Constraint Filter
 *
 * Narrows candidate sequences by intercalary-symbol count and by the longest
 * run of a symbol read around the ring. Both filters keep the relative order
 * of their input.
 */

import { type Sequence, type YearSymbol, intercalaryCount, isSymbol } from './sequence'
import { cyclicPad, isUniform } from './internal/padding'
import { requireInteger } from './internal/validation'

export { InvalidArgumentError } from './errors'
import { InvalidArgumentError } from './errors'

// ============================================================================
// Count Filter
// ============================================================================

/**
 * Keeps sequences whose number of intercalary symbols is in `allowedCounts`.
 * A scalar count is wrapped into a set by `normalizeCounts` before it gets here.
 */
export function filterByCount(
  sequences: readonly Sequence[],
  allowedCounts: ReadonlySet<number>
): Sequence[] {
  if (allowedCounts.size === 0) {
    throw new InvalidArgumentError('allowedCounts must not be empty')
  }
  for (const count of allowedCounts) {
    requireInteger('allowed count', count, 0)
  }

  return sequences.filter(s => allowedCounts.has(intercalaryCount(s)))
}

// ============================================================================
// Run Filter
// ============================================================================

/**
 * Keeps sequences with no cyclic run of `symbol` longer than `maxRun`.
 *
 * A sequence is rejected when its padding to window `maxRun + 1` contains
 * `maxRun + 1` consecutive `symbol`s. A sequence made only of `symbol` has
 * no break anywhere on the ring and is rejected for every `maxRun`.
 */
export function filterByMaxRun(
  sequences: readonly Sequence[],
  symbol: YearSymbol,
  maxRun: number
): Sequence[] {
  if (!isSymbol(symbol)) {
    throw new InvalidArgumentError(`symbol must be '0' or '1', got '${String(symbol)}'`)
  }
  requireInteger('maxRun', maxRun, 0)

  const window = maxRun + 1
  const forbidden = symbol.repeat(window)

  return sequences.filter(s => {
    if (isUniform(s, symbol)) return false
    return !cyclicPad(s, window).includes(forbidden)
  })
}

/**
 * Longest run of `symbol` read cyclically. `Infinity` when the whole ring is
 * `symbol`, 0 when `symbol` does not occur.
 */
export function longestCyclicRun(sequence: Sequence, symbol: YearSymbol): number {
  if (isUniform(sequence, symbol)) return Infinity

  // Start just after a break so no run straddles the starting point
  const start = sequence.indexOf(symbol === '0' ? '1' : '0') + 1
  let longest = 0
  let current = 0
  for (let i = 0; i < sequence.length; i++) {
    if (sequence.charAt((start + i) % sequence.length) === symbol) {
      current++
      if (current > longest) longest = current
    } else {
      current = 0
    }
  }
  return longest
}
