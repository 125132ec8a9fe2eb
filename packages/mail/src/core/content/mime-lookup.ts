import { extname } from "node:path"
import mimeTypes from "nodemailer/lib/mime-funcs/mime-types"

export const OCTET_STREAM = "application/octet-stream"

/** Extensions that mark a compressed payload rather than a content type. */
const COMPRESSION_ENCODINGS: Readonly<Record<string, string>> = {
  gz: "gzip",
  Z: "compress",
  bz2: "bzip2",
  xz: "xz",
  br: "br",
}

export type MimeGuess = {
  mainType: string
  subType: string
  encoding?: string
}

/**
 * Guess the type of a file from its name. Compressed files and unknown
 * extensions are `application/octet-stream`.
 */
export function guessMimeType(filename: string): MimeGuess {
  const extension = extname(filename).slice(1)
  const encoding = COMPRESSION_ENCODINGS[extension]

  if (encoding) {
    return { ...splitMimeType(OCTET_STREAM), encoding }
  }

  if (!extension) return splitMimeType(OCTET_STREAM)

  return splitMimeType(mimeTypes.detectMimeType(filename))
}

/**
 * Split `type/subtype; params` into its parts, ignoring parameters.
 * Returns null when there is no subtype.
 */
export function parseContentType(header: string): MimeGuess | null {
  const [essence = ""] = header.split(";")
  const [mainType, subType] = essence.trim().toLowerCase().split("/")

  if (!mainType || !subType) return null

  return { mainType, subType }
}

function splitMimeType(type: string): MimeGuess {
  return parseContentType(type) ?? { mainType: "application", subType: "octet-stream" }
}
