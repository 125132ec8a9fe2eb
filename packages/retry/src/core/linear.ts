import type { Milliseconds } from "@postline/clock"
import type { Delay, DelayPolicy } from "../ports/delay-policy"

export interface LinearOptions {
  /** Length of one time unit. */
  unit: Milliseconds

  /** Units waited per completed attempt. */
  factor: number
}

/**
 * Waits `(attempt + 1) * factor` units after a failed attempt, so with a
 * factor of 3 the first failure waits 3 units and the second 6.
 */
export function linear(opts: LinearOptions): DelayPolicy {
  const { unit, factor } = opts

  if (!Number.isFinite(unit) || unit < 0) {
    throw new RangeError(`unit must be finite and >= 0 (got ${unit})`)
  }

  if (!Number.isFinite(factor) || factor < 0) {
    throw new RangeError(`factor must be finite and >= 0 (got ${factor})`)
  }

  return {
    getDelay(attempt: number): Delay {
      return { milliseconds: (attempt + 1) * factor * unit }
    },
  }
}
