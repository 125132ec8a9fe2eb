import type { Clock, UnixMs } from "@postline/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor, RetryFn } from "../ports/retry-executor"
import type { RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async tryExecute<T, E = Error>(
    fn: RetryFn<T>,
    config: RetryConfig<T, E>,
  ): Promise<RetryResult<T, E>> {
    this.validateConfig(config)

    const { maxAttempts, delay, errorPredicate, observer } = config
    const startedAt = this.deps.clock.nowMs()

    let attempt = 0

    for (;;) {
      const ctx = this.buildContext(attempt, startedAt)
      const isLastAttempt = attempt === maxAttempts - 1

      await observer?.onAttempt?.(ctx)

      const result = await this.tryAttempt(fn, ctx)

      if (result.ok) {
        await observer?.onSuccess?.(result.value, ctx)

        return {
          success: true,
          value: result.value,
          attempts: ctx.attemptsSoFar,
          elapsedMs: this.elapsedSince(startedAt),
        }
      }

      // Caught values are typed as E at the boundary.
      const error = result.error as E
      const retryable = errorPredicate?.shouldRetry(error, ctx) ?? true

      if (!retryable || isLastAttempt) {
        await observer?.onExhausted?.(error, this.buildAttemptInfo(ctx, null, true))

        return {
          success: false,
          error,
          attempts: ctx.attemptsSoFar,
          elapsedMs: this.elapsedSince(startedAt),
          exhausted: retryable,
        }
      }

      const nextDelayMs = delay.getDelay(attempt).milliseconds

      await observer?.onError?.(error, this.buildAttemptInfo(ctx, nextDelayMs, false))
      await this.deps.clock.sleep(nextDelayMs)

      attempt++
    }
  }

  private async tryAttempt<T>(
    fn: RetryFn<T>,
    ctx: AttemptContext,
  ): Promise<AttemptResult<T>> {
    try {
      const value = await fn(ctx)
      return { ok: true, value }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private validateConfig(config: RetryConfig<unknown, unknown>): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`,
      )
    }
  }

  private elapsedSince(startedAt: UnixMs): number {
    return this.deps.clock.nowMs() - startedAt
  }

  private buildContext(attempt: number, startedAt: UnixMs): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.elapsedSince(startedAt),
    }
  }

  private buildAttemptInfo(
    ctx: AttemptContext,
    nextDelayMs: number | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }
}
