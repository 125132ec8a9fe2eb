export type EmailAddress = {
  email: string
  name?: string
}

/**
 * Recipient input for one of To, Cc or Bcc.
 */
export type AddressInput =
  | { kind: "single"; address: string }
  | { kind: "list"; addresses: readonly string[] }
  | { kind: "aliased"; entries: readonly (readonly [address: string, displayName: string])[] }

/** Loose input lifted by `toAddressInput`. */
export type AddressLike = string | readonly string[] | Readonly<Record<string, string>>

export type AddressHeader = {
  addresses: EmailAddress[]

  /** `"; "`-joined rendering, `Name <email>` for aliased entries. */
  display: string
}

export type AddressHeaderField = "to" | "cc" | "bcc"

export type AddressSet = {
  /** Envelope recipients in input order. Duplicates are kept. */
  recipients: string[]
  headers: Partial<Record<AddressHeaderField, AddressHeader>>
}

export type ResolveAddressesRequest = {
  to?: AddressInput | AddressLike
  cc?: AddressInput | AddressLike
  bcc?: AddressInput | AddressLike

  /** Check address syntax. @default true */
  validate?: boolean

  /** Throw on an invalid address instead of dropping it. @default false */
  strict?: boolean
}
