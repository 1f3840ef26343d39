/**
 * Cycle Rules
 *
 * Caller-facing constraint options and their normalisation into the uniform
 * ConstraintSet the core filters take. A scalar intercalary count becomes a
 * one-element set here and nowhere else.
 */

import { requireInteger } from './internal/validation'

export { InvalidArgumentError } from './errors'
import { InvalidArgumentError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type CycleRules = {
  /** Sequence length n */
  length: number
  /** Accepted numbers of intercalary symbols: one count or several */
  intercalaryCount: number | Iterable<number>
  /** Longest allowed cyclic run of intercalary symbols */
  maxIntercalaryRun: number
  /** Longest allowed cyclic run of ordinary symbols */
  maxOrdinaryRun: number
}

export type ConstraintSet = {
  readonly n: number
  readonly allowedCounts: ReadonlySet<number>
  readonly maxI: number
  readonly maxO: number
}

// ============================================================================
// Defaults
// ============================================================================

/** 19 years, 7 intercalary, never two intercalary or three ordinary in a row */
export const METONIC_RULES: Readonly<CycleRules> = Object.freeze({
  length: 19,
  intercalaryCount: 7,
  maxIntercalaryRun: 1,
  maxOrdinaryRun: 2,
})

// ============================================================================
// Normalisation
// ============================================================================

export function normalizeCounts(value: number | Iterable<number>): ReadonlySet<number> {
  const counts = typeof value === 'number' ? new Set([value]) : new Set(value)
  if (counts.size === 0) {
    throw new InvalidArgumentError('intercalaryCount must name at least one count')
  }
  for (const count of counts) {
    requireInteger('intercalaryCount', count, 0)
  }
  return counts
}

export function resolveRules(rules: Partial<CycleRules> = {}): ConstraintSet {
  const merged: CycleRules = { ...METONIC_RULES, ...stripUndefined(rules) }

  return Object.freeze({
    n: requireInteger('length', merged.length, 1),
    allowedCounts: normalizeCounts(merged.intercalaryCount),
    maxI: requireInteger('maxIntercalaryRun', merged.maxIntercalaryRun, 0),
    maxO: requireInteger('maxOrdinaryRun', merged.maxOrdinaryRun, 0),
  })
}

// { length: undefined } must fall back to the default, not override it
function stripUndefined(rules: Partial<CycleRules>): Partial<CycleRules> {
  const out: Partial<CycleRules> = {}
  if (rules.length !== undefined) out.length = rules.length
  if (rules.intercalaryCount !== undefined) out.intercalaryCount = rules.intercalaryCount
  if (rules.maxIntercalaryRun !== undefined) out.maxIntercalaryRun = rules.maxIntercalaryRun
  if (rules.maxOrdinaryRun !== undefined) out.maxOrdinaryRun = rules.maxOrdinaryRun
  return out
}
