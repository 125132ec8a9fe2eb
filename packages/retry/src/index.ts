export { type LinearOptions, linear } from "./core/linear"
export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { RetryObserver } from "./ports/observer"
export type { ErrorPredicate, RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor, RetryFn } from "./ports/retry-executor"
export type {
  FailedRetryResult,
  RetryResult,
  SuccessfulRetryResult,
} from "./ports/retry-result"
