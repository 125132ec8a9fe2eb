import type { Milliseconds } from "@postline/clock"

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay to wait after attempt `attempt` failed; attempt is 0-indexed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
