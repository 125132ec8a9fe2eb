import { linear } from "../linear"

describe("linear", () => {
  it("waits factor units after the first failed attempt", () => {
    const policy = linear({ unit: 1000, factor: 3 })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 3000 })
  })

  it("grows by factor units per attempt", () => {
    const policy = linear({ unit: 1000, factor: 3 })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 6000 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 9000 })
  })

  it("scales with the unit", () => {
    const policy = linear({ unit: 1, factor: 3 })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 3 })
    expect(policy.getDelay(1)).toEqual({ milliseconds: 6 })
  })

  it("returns zero delays for a zero factor", () => {
    const policy = linear({ unit: 1000, factor: 0 })

    expect(policy.getDelay(4)).toEqual({ milliseconds: 0 })
  })

  it("rejects negative or non-finite settings", () => {
    expect(() => linear({ unit: -1, factor: 3 })).toThrow(RangeError)
    expect(() => linear({ unit: 1000, factor: Number.NaN })).toThrow(RangeError)
  })
})
