/**
 * Cyclic Padding
 *
 * Appends a prefix of a ring to its own end so that ordinary substring search
 * sees windows spanning the boundary. For `window <= source.length + 1`,
 * every window of that length read cyclically from `source` is a substring
 * of `cyclicPad(source, window)`.
 */

import type { Sequence } from '../sequence'

/**
 * `source` followed by its first `window - 1` symbols. The prefix is taken
 * at most once, so the result never exceeds two laps of the ring.
 */
export function cyclicPad(source: Sequence, window: number): string {
  return source + source.slice(0, Math.max(0, window - 1))
}

/** True when every symbol of `sequence` equals `symbol`. */
export function isUniform(sequence: Sequence, symbol: string): boolean {
  for (const ch of sequence) {
    if (ch !== symbol) return false
  }
  return true
}
