import type { Milliseconds, UnixMs } from "@postline/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** Total attempts so far (attempt + 1) */
  attemptsSoFar: number

  /** Epoch ms when first attempt started */
  startedAt: UnixMs

  /** ms since first attempt started */
  elapsedMs: Milliseconds
}

export interface RetryAttemptInfo extends AttemptContext {
  /** ms until next attempt, null once no further attempt will be made */
  nextDelayMs: Milliseconds | null

  isLastAttempt: boolean
}
