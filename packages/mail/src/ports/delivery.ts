import type { AddressSet } from "./address"

export type SentResult = {
  status: "sent"
  recipients: string[]
  accepted: string[]
  rejected: string[]
  response: string
  attempts: number
}

/** Retries ran out; the message waits in the unsent queue. */
export type QueuedResult = {
  status: "queued"
  recipients: string[]
  attempts: number
  error: unknown
}

/** Nothing left to send after address resolution. */
export type SkippedResult = {
  status: "skipped"
  recipients: []
}

export type DeliveryResult = SentResult | QueuedResult | SkippedResult

export type MessagePreview = {
  status: "preview"
  addresses: AddressSet
  raw: Buffer
}

export function isDelivered(result: DeliveryResult | MessagePreview): result is SentResult {
  return result.status === "sent"
}
