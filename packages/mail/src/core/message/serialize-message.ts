import MimeNode from "nodemailer/lib/mime-node"
import type { EmailAddress } from "../../ports/address"
import type { ComposedMessage, MimePart } from "../../ports/message"
import { formatAddress } from "../addresses/resolve-addresses"

const HEADER_END = "\r\n\r\n"

/**
 * Render a composed message as RFC 5322 bytes: a `multipart/mixed` root
 * holding the alternative container (when it has parts) and the mixed parts.
 *
 * Bcc is never written; those recipients only appear in the envelope.
 */
export async function serializeMessage(message: ComposedMessage): Promise<Buffer> {
  const root = new MimeNode("multipart/mixed")
  const { headers } = message.addresses

  root.setHeader("From", formatAddress(message.from))
  root.setHeader("To", formatAddressList(headers.to?.addresses ?? [message.from]))
  if (headers.cc) root.setHeader("Cc", formatAddressList(headers.cc.addresses))
  if (message.subject) root.setHeader("Subject", message.subject)

  if (message.alternative.length > 0) {
    const alternative = root.createChild("multipart/alternative")
    for (const part of message.alternative) appendPart(alternative, part)
  }

  for (const part of message.mixed) appendPart(root, part)

  if (message.alternative.length === 0 && message.mixed.length === 0) {
    root.createChild("text/plain").setContent("")
  }

  const raw = await build(root)

  return message.preamble ? insertPreamble(raw, message.preamble) : raw
}

function appendPart(parent: MimeNode, part: MimePart): void {
  const node = parent.createChild(part.contentType, {
    ...(part.filename && { filename: part.filename }),
  })

  if (part.transferEncoding) node.setHeader("Content-Transfer-Encoding", part.transferEncoding)
  if (part.disposition) node.setHeader("Content-Disposition", part.disposition)
  if (part.contentId) node.setHeader("Content-ID", `<${part.contentId}>`)

  node.setContent(typeof part.content === "string" ? part.content : Buffer.from(part.content))
}

function formatAddressList(addresses: EmailAddress[]): string {
  return addresses.map(formatAddress).join(", ")
}

function build(node: MimeNode): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    node.build((err, buf) => {
      if (err) reject(err)
      else resolve(buf)
    })
  })
}

/** Place the preamble between the root headers and the first boundary. */
function insertPreamble(raw: Buffer, preamble: string): Buffer {
  const headerEnd = raw.indexOf(HEADER_END)
  if (headerEnd === -1) return raw

  const bodyStart = headerEnd + HEADER_END.length

  return Buffer.concat([
    raw.subarray(0, bodyStart),
    Buffer.from(`${preamble}\r\n`),
    raw.subarray(bodyStart),
  ])
}
