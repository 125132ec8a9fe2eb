import { FakeClock } from "../fake-clock"

describe("FakeClock", () => {
  it("starts at the given time", () => {
    const clock = new FakeClock(1_000)

    expect(clock.nowMs()).toBe(1_000)
    expect(clock.now()).toEqual(new Date(1_000))
  })

  it("records sleeps in call order and advances time", async () => {
    const clock = new FakeClock(0)

    await clock.sleep(3_000)
    await clock.sleep(6_000)

    expect(clock.sleeps()).toEqual([3_000, 6_000])
    expect(clock.nowMs()).toBe(9_000)
  })

  it("does not move backwards on negative sleeps", async () => {
    const clock = new FakeClock(500)

    await clock.sleep(-10)

    expect(clock.nowMs()).toBe(500)
    expect(clock.sleeps()).toEqual([-10])
  })

  it("returns a copy of the sleep log", async () => {
    const clock = new FakeClock()
    await clock.sleep(1)

    clock.sleeps().push(99)

    expect(clock.sleeps()).toEqual([1])
  })
})
