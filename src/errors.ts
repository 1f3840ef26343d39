/**
 * Consolidated error system for metonic-necklaces.
 *
 * All error classes extend NecklaceError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * wherever the failing operation lives.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const NecklaceErrorCode = {
  // Argument validation (generation, filters, rules, calendar)
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Sequence parsing
  INVALID_SEQUENCE: 'INVALID_SEQUENCE',

  // Necklace reduction
  LENGTH_MISMATCH: 'LENGTH_MISMATCH',
} as const

export type NecklaceErrorCode = (typeof NecklaceErrorCode)[keyof typeof NecklaceErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class NecklaceError extends Error {
  readonly code: NecklaceErrorCode

  constructor(code: NecklaceErrorCode, message: string) {
    super(message)
    this.name = 'NecklaceError'
    this.code = code
  }
}

// ============================================================================
// Argument Errors
// ============================================================================

export class InvalidArgumentError extends NecklaceError {
  constructor(message: string) {
    super(NecklaceErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Sequence Errors
// ============================================================================

export class InvalidSequenceError extends NecklaceError {
  constructor(message: string) {
    super(NecklaceErrorCode.INVALID_SEQUENCE, message)
    this.name = 'InvalidSequenceError'
  }
}

// ============================================================================
// Reduction Errors
// ============================================================================

export class LengthMismatchError extends NecklaceError {
  constructor(message: string) {
    super(NecklaceErrorCode.LENGTH_MISMATCH, message)
    this.name = 'LengthMismatchError'
  }
}
