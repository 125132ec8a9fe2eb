import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /** Current time as a Date object. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds.
   *
   * @remarks
   * Backoff waits between delivery attempts go through this, so tests can
   * observe them without real timers.
   */
  sleep(ms: Milliseconds): Promise<void>
}

export type Clock = TimeSource & Sleeper
