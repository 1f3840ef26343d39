/**
 * metonic-necklaces
 *
 * Public API exports
 */

// Error system (canonical source — base class, codes, all error classes)
export {
  NecklaceError, NecklaceErrorCode,
  InvalidArgumentError, InvalidSequenceError, LengthMismatchError,
} from './errors'
export type { NecklaceErrorCode as NecklaceErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Sequences (branded type + display helpers)
export type { Sequence, YearSymbol } from './sequence'
export {
  ORDINARY, INTERCALARY,
  isSymbol, parseSequence, makeSequence, fromInts, fromDisplayString,
  countSymbol, intercalaryCount,
  asString, asInts,
} from './sequence'

// Generation
export { generate, enumerateSequences } from './generation'

// Constraint filtering
export { filterByCount, filterByMaxRun, longestCyclicRun } from './constraint-filter'

// Necklace reduction
export { reduce, isRotationOf, canonicalOf } from './necklace-reduction'

// Cyclic substrings
export { segments, segmentsOf, isInCycle, findInCycles } from './cyclic-substring'

// Rules (configuration + scalar-or-set normalisation)
export type { CycleRules, ConstraintSet } from './rules'
export { METONIC_RULES, normalizeCounts, resolveRules } from './rules'

// High-level cycle sets
export type { CycleEngine } from './cycle-set'
export { combinations, cycleSet, cycleSetOf, createCycleEngine } from './cycle-set'

// Calendar
export type { MetonicPosition } from './calendar'
export {
  ATHENS, METONIC_YEAR_ZERO, CYCLE_LENGTH,
  toMetonic, fromMetonic, isIntercalaryYear,
} from './calendar'

// Version
export { VERSION, version } from './version'
