/**
 * Argument Validation
 *
 * Shared guards that throw InvalidArgumentError for out-of-range integers.
 */

import { InvalidArgumentError } from '../errors'

export function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${value}`)
  }
  if (value < min) {
    throw new InvalidArgumentError(`${name} must be >= ${min}, got ${value}`)
  }
  return value
}
