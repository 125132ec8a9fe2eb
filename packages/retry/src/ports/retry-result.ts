import type { Milliseconds } from "@postline/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult<E = Error> = {
  success: false
  error: E
  attempts: number
  elapsedMs: Milliseconds

  /**
   * True when every allowed attempt failed with a retryable error; false
   * when the predicate refused to retry the last error.
   */
  exhausted: boolean
}

export type RetryResult<T, E = Error> = SuccessfulRetryResult<T> | FailedRetryResult<E>
