/**
 * Metonic Calendar
 *
 * Converts astronomical years (1 BCE is year 0, earlier years negative) to a
 * position within the 19-year Metonic cycle and back, counting cycles from
 * the epoch of 432 BCE.
 */

import { type Sequence, INTERCALARY, makeSequence } from './sequence'
import { requireInteger } from './internal/validation'

export { InvalidArgumentError } from './errors'
import { InvalidArgumentError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const CYCLE_LENGTH = 19

/** Astronomical year of position 1 in cycle 1 */
export const METONIC_YEAR_ZERO = -431

/** Ordinary/intercalary pattern of the Athenian calendar */
export const ATHENS: Sequence = makeSequence('0100100101001001010')

// ============================================================================
// Types
// ============================================================================

export type MetonicPosition = {
  /** 1-based cycle number; cycle 0 and below precede the epoch */
  cycle: number
  /** 1-19 */
  position: number
}

// ============================================================================
// Conversion
// ============================================================================

export function toMetonic(year: number): MetonicPosition {
  requireInteger('year', year, Number.MIN_SAFE_INTEGER)
  const offset = year - METONIC_YEAR_ZERO
  return {
    cycle: Math.floor(offset / CYCLE_LENGTH) + 1,
    position: (((offset % CYCLE_LENGTH) + CYCLE_LENGTH) % CYCLE_LENGTH) + 1,
  }
}

export function fromMetonic(cycle: number, position: number): number {
  requireInteger('cycle', cycle, Number.MIN_SAFE_INTEGER)
  requireInteger('position', position, 1)
  if (position > CYCLE_LENGTH) {
    throw new InvalidArgumentError(`position must be <= ${CYCLE_LENGTH}, got ${position}`)
  }
  return (cycle - 1) * CYCLE_LENGTH + METONIC_YEAR_ZERO + (position - 1)
}

/** Whether `year` is intercalary under a 19-year `cycle` pattern */
export function isIntercalaryYear(year: number, cycle: Sequence = ATHENS): boolean {
  if (cycle.length !== CYCLE_LENGTH) {
    throw new InvalidArgumentError(
      `cycle must be ${CYCLE_LENGTH} years long, got ${cycle.length}`
    )
  }
  const { position } = toMetonic(year)
  return cycle.charAt(position - 1) === INTERCALARY
}
