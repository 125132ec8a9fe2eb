import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Deterministic clock for tests.
 *
 * `sleep` never waits: it records the requested duration and moves the
 * clock forward by that amount.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly slept: Milliseconds[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  async sleep(ms: Milliseconds): Promise<void> {
    this.slept.push(ms)
    this.advance(Math.max(0, ms))
  }

  /** Durations passed to `sleep`, in call order. */
  sleeps(): Milliseconds[] {
    return [...this.slept]
  }
}
