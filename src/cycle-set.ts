/**
 * Cycle Sets
 *
 * Composes generation, filtering and reduction under a set of CycleRules.
 * Called with no arguments, everything here reproduces the Metonic rules:
 * 57 compliant sequences reducing to 3 canonical 19-year cycles.
 */

import { type Sequence, INTERCALARY, ORDINARY } from './sequence'
import { generate } from './generation'
import { filterByCount, filterByMaxRun } from './constraint-filter'
import { reduce, canonicalOf as findCanonical } from './necklace-reduction'
import { segments as segmentsOfCycles, findInCycles } from './cyclic-substring'
import { type CycleRules, type ConstraintSet, resolveRules } from './rules'

// ============================================================================
// Types
// ============================================================================

export type CycleEngine = {
  readonly rules: ConstraintSet
  /** Every rule-compliant sequence, all rotations included, ascending */
  combinations(): Sequence[]
  /** One canonical cycle per necklace, in first-seen order */
  cycleSet(): Sequence[]
  segments(m: number): Sequence[]
  find(test: Sequence): Sequence[]
  canonicalOf(sequence: Sequence): Sequence | undefined
}

// ============================================================================
// Functions
// ============================================================================

function filterAll(constraints: ConstraintSet): Sequence[] {
  const counted = filterByCount(generate(constraints.n), constraints.allowedCounts)
  const noLongI = filterByMaxRun(counted, INTERCALARY, constraints.maxI)
  return filterByMaxRun(noLongI, ORDINARY, constraints.maxO)
}

export function combinations(rules: Partial<CycleRules> = {}): Sequence[] {
  return filterAll(resolveRules(rules))
}

export function cycleSet(rules: Partial<CycleRules> = {}): Sequence[] {
  return reduce(combinations(rules))
}

/**
 * Reduces a caller-supplied collection after sorting it ascending, so the
 * chosen representatives do not depend on the order the caller used.
 */
export function cycleSetOf(sequences: Iterable<Sequence>): Sequence[] {
  return reduce([...sequences].sort())
}

// ============================================================================
// Engine
// ============================================================================

export function createCycleEngine(rules: Partial<CycleRules> = {}): CycleEngine {
  const constraints = resolveRules(rules)
  let cached: readonly Sequence[] | undefined

  function cycles(): readonly Sequence[] {
    if (cached === undefined) cached = reduce(filterAll(constraints))
    return cached
  }

  return {
    rules: constraints,
    combinations: () => filterAll(constraints),
    cycleSet: () => [...cycles()],
    segments: (m: number) => segmentsOfCycles(cycles(), m),
    find: (test: Sequence) => findInCycles(test, cycles()),
    canonicalOf: (sequence: Sequence) => findCanonical(sequence, cycles()),
  }
}
