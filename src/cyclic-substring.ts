/**
 * Cyclic Substring Index
 *
 * Segment extraction and membership queries over sequences read as rings.
 * Every query pads the ring with `cyclicPad` to the width of the window it
 * searches for, so windows spanning the end and start of a cycle are found.
 */

import type { Sequence } from './sequence'
import { cyclicPad } from './internal/padding'
import { requireInteger } from './internal/validation'

export { InvalidArgumentError } from './errors'
import { InvalidArgumentError } from './errors'

// ============================================================================
// Segments
// ============================================================================

function collectSegments(source: Sequence, m: number, into: Set<Sequence>): void {
  if (m > source.length) {
    throw new InvalidArgumentError(
      `Segment width ${m} exceeds cycle length ${source.length} ('${source}')`
    )
  }
  const padded = cyclicPad(source, m)
  for (let start = 0; start < source.length; start++) {
    into.add(padded.slice(start, start + m) as Sequence)
  }
}

/**
 * Distinct length-`m` windows read cyclically from `source`, or from every
 * member of a collection of cycles, sorted ascending.
 */
export function segments(source: Sequence, m: number): Sequence[]
export function segments(sources: readonly Sequence[], m: number): Sequence[]
export function segments(source: Sequence | readonly Sequence[], m: number): Sequence[] {
  requireInteger('m', m, 1)

  const found = new Set<Sequence>()
  if (typeof source === 'string') {
    collectSegments(source, m, found)
  } else {
    for (const cycle of source) collectSegments(cycle, m, found)
  }
  return [...found].sort()
}

/** Explicit collection form of `segments`, for callers holding a list. */
export function segmentsOf(sources: readonly Sequence[], m: number): Sequence[] {
  return segments(sources, m)
}

// ============================================================================
// Membership
// ============================================================================

/**
 * True iff `test` occurs in `cycle` read as a ring. A `test` longer than
 * `cycle` is searched in at most two laps of the ring.
 */
export function isInCycle(test: Sequence, cycle: Sequence): boolean {
  return cyclicPad(cycle, test.length).includes(test)
}

/** Members of `cycles` containing `test`, in input order. Empty when none match. */
export function findInCycles(test: Sequence, cycles: readonly Sequence[]): Sequence[] {
  return cycles.filter(cycle => isInCycle(test, cycle))
}
