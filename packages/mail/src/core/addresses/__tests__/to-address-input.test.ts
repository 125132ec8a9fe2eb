import { InvalidAddressError } from "../../errors/mail-error"
import { toAddressInput } from "../to-address-input"

describe("toAddressInput", () => {
  it("lifts a string to a single address", () => {
    expect(toAddressInput("ada@example.com")).toEqual({
      kind: "single",
      address: "ada@example.com",
    })
  })

  it("lifts an array to a list", () => {
    expect(toAddressInput(["a@example.com", "b@example.com"])).toEqual({
      kind: "list",
      addresses: ["a@example.com", "b@example.com"],
    })
  })

  it("lifts a mapping to aliased entries in key order", () => {
    expect(toAddressInput({ "a@example.com": "Ada", "b@example.com": "Bob" })).toEqual({
      kind: "aliased",
      entries: [
        ["a@example.com", "Ada"],
        ["b@example.com", "Bob"],
      ],
    })
  })

  it("passes tagged input through", () => {
    const input = { kind: "list", addresses: ["a@example.com"] } as const

    expect(toAddressInput(input)).toEqual(input)
  })

  it.each([[42], [null], [undefined], [["a@example.com", 7]], [{ "a@example.com": 1 }]])(
    "rejects %j",
    (value) => {
      expect(() => toAddressInput(value)).toThrow(InvalidAddressError)
    },
  )

  it("rejects malformed tagged input", () => {
    expect(() => toAddressInput({ kind: "aliased", entries: [["a@example.com"]] })).toThrow(
      "Malformed aliased address input",
    )
  })
})
