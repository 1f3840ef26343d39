/**
 * Necklace Reduction
 *
 * Collapses an ordered list of equal-length sequences to one representative
 * per rotation class. The representative is the first member of its class in
 * input order; the input is never re-sorted here.
 *
 * For equal-length a and b, b is a rotation of a iff b is a substring of
 * cyclicPad(a, a.length).
 */

import type { Sequence } from './sequence'
import { cyclicPad } from './internal/padding'

export { LengthMismatchError } from './errors'
import { LengthMismatchError } from './errors'

type Accepted = {
  cycle: Sequence
  padded: string
}

// ============================================================================
// Reduction
// ============================================================================

/**
 * Returns the Cycle Set of `sequences`: canonical cycles in the order they
 * were first accepted. Iterative over an accepted-list accumulator, since
 * candidate counts grow as 2^n.
 */
export function reduce(sequences: readonly Sequence[]): Sequence[] {
  const accepted: Accepted[] = []
  let length: number | undefined

  for (const candidate of sequences) {
    if (length === undefined) {
      length = candidate.length
    } else if (candidate.length !== length) {
      throw new LengthMismatchError(
        `All sequences must have length ${length}, got '${candidate}' (${candidate.length})`
      )
    }

    if (accepted.some(a => a.padded.includes(candidate))) continue
    accepted.push({ cycle: candidate, padded: cyclicPad(candidate, candidate.length) })
  }

  return accepted.map(a => a.cycle)
}

// ============================================================================
// Rotation Queries
// ============================================================================

export function isRotationOf(a: Sequence, b: Sequence): boolean {
  return a.length === b.length && cyclicPad(a, a.length).includes(b)
}

/** Member of `cycleSet` that `sequence` is a rotation of, if any. */
export function canonicalOf(
  sequence: Sequence,
  cycleSet: readonly Sequence[]
): Sequence | undefined {
  return cycleSet.find(cycle => isRotationOf(cycle, sequence))
}
