import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks around each attempt.
 *
 * @remarks
 * `onError` runs before the backoff sleep, so it is the place to mark a
 * broken connection for re-establishment. Throwing from a hook is treated
 * as a programmer error and propagates.
 */
export interface RetryObserver<T, E = Error> {
  onAttempt?(ctx: AttemptContext): Promise<void> | void
  onError?(error: E, info: RetryAttemptInfo): Promise<void> | void
  onSuccess?(result: T, ctx: AttemptContext): Promise<void> | void
  onExhausted?(error: E, info: RetryAttemptInfo): Promise<void> | void
}
