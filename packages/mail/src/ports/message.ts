import type { AddressSet, EmailAddress } from "./address"

export type MimePart = {
  contentType: string
  content: string | Uint8Array
  transferEncoding?: "base64"
  disposition?: "inline" | "attachment"
  filename?: string
  contentId?: string
}

export type ComposedMessage = {
  from: EmailAddress
  subject?: string
  addresses: AddressSet

  /** HTML fragments referencing embedded images by content-ID. */
  alternative: MimePart[]

  /** Attachments, literal bodies and the images themselves. */
  mixed: MimePart[]

  preamble?: string
}
