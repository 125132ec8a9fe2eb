import { InvalidAddressError } from "../errors/mail-error"
import type { AddressInput, AddressLike } from "../../ports/address"

/**
 * Lift loose recipient input into an `AddressInput`. Tagged values are
 * checked and passed through.
 */
export function toAddressInput(value: AddressInput | AddressLike): AddressInput
export function toAddressInput(value: unknown): AddressInput
export function toAddressInput(value: unknown): AddressInput {
  if (typeof value === "string") {
    return { kind: "single", address: value }
  }

  if (Array.isArray(value)) {
    return { kind: "list", addresses: toStringList(value) }
  }

  if (isPlainObject(value)) {
    if (isTaggedInput(value)) return checkTagged(value)

    return { kind: "aliased", entries: toAliasEntries(value) }
  }

  throw new InvalidAddressError("Address must be a string, a list of strings or an address-to-name mapping", {
    context: { received: describe(value) },
  })
}

function isTaggedInput(value: Record<string, unknown>): boolean {
  return value.kind === "single" || value.kind === "list" || value.kind === "aliased"
}

function checkTagged(value: Record<string, unknown>): AddressInput {
  switch (value.kind) {
    case "single":
      if (typeof value.address === "string") return { kind: "single", address: value.address }
      break
    case "list":
      if (Array.isArray(value.addresses)) {
        return { kind: "list", addresses: toStringList(value.addresses) }
      }
      break
    case "aliased":
      if (Array.isArray(value.entries) && value.entries.every(isAliasEntry)) {
        return { kind: "aliased", entries: value.entries }
      }
      break
  }

  throw new InvalidAddressError(`Malformed ${String(value.kind)} address input`)
}

function toStringList(values: unknown[]): string[] {
  const out: string[] = []

  for (const v of values) {
    if (typeof v !== "string") {
      throw new InvalidAddressError("Address lists may only contain strings", {
        context: { received: describe(v) },
      })
    }
    out.push(v)
  }

  return out
}

function toAliasEntries(mapping: Record<string, unknown>): [string, string][] {
  return Object.entries(mapping).map(([address, name]) => {
    if (typeof name !== "string") {
      throw new InvalidAddressError("Display names must be strings", {
        context: { address, received: describe(name) },
      })
    }
    return [address, name]
  })
}

function isAliasEntry(entry: unknown): entry is [string, string] {
  return (
    Array.isArray(entry) &&
    entry.length === 2 &&
    typeof entry[0] === "string" &&
    typeof entry[1] === "string"
  )
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function describe(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}
