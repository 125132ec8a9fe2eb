import type { AttemptContext } from "./attempt-context"
import type { RetryConfig } from "./retry-config"
import type { RetryResult } from "./retry-result"

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>

/**
 * Runs a function with retries, returning a result wrapper instead of
 * throwing for attempt failures. Observer and predicate exceptions propagate.
 */
export interface IRetryExecutor {
  tryExecute<T, E = Error>(
    fn: RetryFn<T>,
    config: RetryConfig<T, E>,
  ): Promise<RetryResult<T, E>>
}
