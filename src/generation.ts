/**
 * Sequence Generation
 *
 * Enumerates every binary sequence of a fixed length in ascending order of
 * its value read as a binary number, most significant position first. The
 * necklace reducer keeps the first member of each rotation class it sees,
 * so this order decides which rotation becomes canonical.
 */

import type { Sequence } from './sequence'
import { requireInteger } from './internal/validation'

export { InvalidArgumentError } from './errors'

// Increments a digit array like an odometer, so there is no ceiling from
// floating-point integer precision.
function* odometer(n: number): Generator<Sequence, void, undefined> {
  const digits = Array.from({ length: n }, (): '0' | '1' => '0')
  for (;;) {
    yield digits.join('') as Sequence

    // Carry from the least significant position
    let pos = n - 1
    while (pos >= 0 && digits[pos] === '1') {
      digits[pos] = '0'
      pos--
    }
    if (pos < 0) return
    digits[pos] = '1'
  }
}

/**
 * Lazily yields all `2^n` sequences of length `n`, from `0…0` to `1…1`.
 * Validates `n` on call, before the first value is pulled.
 */
export function enumerateSequences(n: number): Generator<Sequence, void, undefined> {
  requireInteger('n', n, 1)
  return odometer(n)
}

export function generate(n: number): Sequence[] {
  requireInteger('n', n, 1)
  return Array.from(enumerateSequences(n))
}
