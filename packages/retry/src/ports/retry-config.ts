import type { AttemptContext } from "./attempt-context"
import type { DelayPolicy } from "./delay-policy"
import type { RetryObserver } from "./observer"

/**
 * Determines whether a failed attempt may be retried.
 */
export interface ErrorPredicate<E = Error> {
  shouldRetry(error: E, ctx: AttemptContext): boolean
}

/**
 * `maxAttempts` is total tries, not retries: 3 means one try and up to two
 * retries. Without an `errorPredicate` every error is retried.
 */
export interface RetryConfig<T = unknown, E = Error> {
  maxAttempts: number
  delay: DelayPolicy
  errorPredicate?: ErrorPredicate<E>
  observer?: RetryObserver<T, E>
}
