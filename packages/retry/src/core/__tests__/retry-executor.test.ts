import { FakeClock } from "@postline/clock"
import { linear } from "../linear"
import { createRetryExecutor } from "../retry-executor"

class Flaky extends Error {}
class Fatal extends Error {}

describe("RetryExecutor", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(0)
  })

  const delay = linear({ unit: 1, factor: 3 })
  const onlyFlaky = { shouldRetry: (err: Error) => err instanceof Flaky }

  it("returns the value of the first successful attempt", async () => {
    const executor = createRetryExecutor({ clock })
    const fn = vi.fn(async () => "ok")

    const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

    expect(result).toEqual({ success: true, value: "ok", attempts: 1, elapsedMs: 0 })
    expect(fn).toHaveBeenCalledTimes(1)
    expect(clock.sleeps()).toEqual([])
  })

  it("sleeps between attempts and succeeds on a later attempt", async () => {
    const executor = createRetryExecutor({ clock })
    let calls = 0
    const fn = vi.fn(async () => {
      calls++
      if (calls < 3) throw new Flaky("drop")
      return calls
    })

    const result = await executor.tryExecute(fn, {
      maxAttempts: 3,
      delay,
      errorPredicate: onlyFlaky,
    })

    expect(result).toMatchObject({ success: true, value: 3, attempts: 3, elapsedMs: 9 })
    expect(clock.sleeps()).toEqual([3, 6])
  })

  it("reports exhaustion after maxAttempts retryable failures without a final sleep", async () => {
    const executor = createRetryExecutor({ clock })
    const error = new Flaky("drop")
    const fn = vi.fn(async () => {
      throw error
    })

    const result = await executor.tryExecute(fn, {
      maxAttempts: 3,
      delay,
      errorPredicate: onlyFlaky,
    })

    expect(result).toEqual({
      success: false,
      error,
      attempts: 3,
      elapsedMs: 9,
      exhausted: true,
    })
    expect(fn).toHaveBeenCalledTimes(3)
    expect(clock.sleeps()).toEqual([3, 6])
  })

  it("stops at once when the predicate refuses to retry", async () => {
    const executor = createRetryExecutor({ clock })
    const error = new Fatal("rejected")
    const fn = vi.fn(async () => {
      throw error
    })

    const result = await executor.tryExecute(fn, {
      maxAttempts: 3,
      delay,
      errorPredicate: onlyFlaky,
    })

    expect(result).toMatchObject({ success: false, error, attempts: 1, exhausted: false })
    expect(clock.sleeps()).toEqual([])
  })

  it("passes 0-indexed attempt contexts to the function", async () => {
    const executor = createRetryExecutor({ clock })
    const seen: number[] = []

    await executor.tryExecute(
      async (ctx) => {
        seen.push(ctx.attempt)
        throw new Flaky("drop")
      },
      { maxAttempts: 3, delay },
    )

    expect(seen).toEqual([0, 1, 2])
  })

  it("notifies the observer in order", async () => {
    const executor = createRetryExecutor({ clock })
    const events: string[] = []
    let calls = 0

    await executor.tryExecute(
      async () => {
        calls++
        if (calls === 1) throw new Flaky("drop")
        return "done"
      },
      {
        maxAttempts: 3,
        delay,
        observer: {
          onAttempt: (ctx) => {
            events.push(`attempt:${ctx.attempt}`)
          },
          onError: (_err, info) => {
            events.push(`error:${info.nextDelayMs}`)
          },
          onSuccess: (value) => {
            events.push(`success:${value}`)
          },
        },
      },
    )

    expect(events).toEqual(["attempt:0", "error:3", "attempt:1", "success:done"])
  })

  it("calls onExhausted with a null next delay", async () => {
    const executor = createRetryExecutor({ clock })
    const onExhausted = vi.fn()

    await executor.tryExecute(
      async () => {
        throw new Flaky("drop")
      },
      { maxAttempts: 2, delay, observer: { onExhausted } },
    )

    expect(onExhausted).toHaveBeenCalledTimes(1)
    expect(onExhausted.mock.calls[0]?.[1]).toMatchObject({
      attempt: 1,
      nextDelayMs: null,
      isLastAttempt: true,
    })
  })

  it("propagates observer errors", async () => {
    const executor = createRetryExecutor({ clock })

    await expect(
      executor.tryExecute(
        async () => {
          throw new Flaky("drop")
        },
        {
          maxAttempts: 2,
          delay,
          observer: {
            onError: () => {
              throw new Error("observer bug")
            },
          },
        },
      ),
    ).rejects.toThrow("observer bug")
  })

  it("rejects invalid maxAttempts", async () => {
    const executor = createRetryExecutor({ clock })

    await expect(
      executor.tryExecute(async () => 1, { maxAttempts: 0, delay }),
    ).rejects.toThrow(RangeError)
  })
})
