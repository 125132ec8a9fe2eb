import type { Logger } from "@postline/logger"
import { InvalidAddressError } from "../errors/mail-error"
import type {
  AddressHeader,
  AddressHeaderField,
  AddressInput,
  AddressSet,
  EmailAddress,
  ResolveAddressesRequest,
} from "../../ports/address"
import { toAddressInput } from "./to-address-input"
import { isValidEmail } from "./validate-address"

export type AddressOwner = {
  /** Authenticated mailbox, used when no `to` is given. */
  user: string
  displayName: string
}

export type ResolveAddressesDeps = {
  owner: AddressOwner
  logger: Logger
}

/**
 * Resolve To, Cc and Bcc into envelope recipients and display headers.
 *
 * Without `to`, the message goes to the session user: with a `To` header
 * when both `cc` and `bcc` are given, without one otherwise. An empty
 * result means there is nothing to send.
 */
export function resolveAddresses(
  deps: ResolveAddressesDeps,
  request: ResolveAddressesRequest,
): AddressSet {
  const { owner, logger } = deps
  const set: AddressSet = { recipients: [], headers: {} }

  if (request.to !== undefined) {
    addField(set, "to", toAddressInput(request.to))
  } else if (request.cc !== undefined && request.bcc !== undefined) {
    addField(set, "to", ownerInput(owner))
  } else {
    set.recipients.push(owner.user)
  }

  if (request.cc !== undefined) addField(set, "cc", toAddressInput(request.cc))
  if (request.bcc !== undefined) addField(set, "bcc", toAddressInput(request.bcc))

  if (request.validate ?? true) {
    dropInvalid(set, request.strict ?? false, logger)
  }

  return set
}

function ownerInput(owner: AddressOwner): AddressInput {
  if (owner.displayName === owner.user) return { kind: "single", address: owner.user }

  return { kind: "aliased", entries: [[owner.user, owner.displayName]] }
}

function addField(set: AddressSet, field: AddressHeaderField, input: AddressInput): void {
  const addresses = toEmailAddresses(input)

  set.recipients.push(...addresses.map((a) => a.email))
  set.headers[field] = toHeader(addresses)
}

function toEmailAddresses(input: AddressInput): EmailAddress[] {
  switch (input.kind) {
    case "single":
      return [{ email: input.address }]
    case "list":
      return input.addresses.map((email) => ({ email }))
    case "aliased":
      return input.entries.map(([email, name]) => ({ email, name }))
  }
}

function toHeader(addresses: EmailAddress[]): AddressHeader {
  return {
    addresses,
    display: addresses.map(formatAddress).join("; "),
  }
}

export function formatAddress(address: EmailAddress): string {
  return address.name ? `${address.name} <${address.email}>` : address.email
}

function dropInvalid(set: AddressSet, strict: boolean, logger: Logger): void {
  const invalid = new Set<string>()

  for (const address of set.recipients) {
    if (isValidEmail(address)) continue

    if (strict) {
      throw new InvalidAddressError(`Invalid email address: ${address}`, {
        context: { address },
      })
    }
    invalid.add(address)
  }

  if (invalid.size === 0) return

  for (const address of invalid) {
    logger.warn("Dropping invalid email address", { address })
  }

  set.recipients = set.recipients.filter((r) => !invalid.has(r))

  for (const field of ["to", "cc", "bcc"] as const) {
    const header = set.headers[field]
    if (!header) continue

    const kept = header.addresses.filter((a) => !invalid.has(a.email))

    if (kept.length === 0) {
      delete set.headers[field]
    } else {
      set.headers[field] = toHeader(kept)
    }
  }
}
