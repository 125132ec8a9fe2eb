/**
 * One content item of a message. `auto` is classified by probing for a
 * local file, then a fetchable URL, then falling back to literal text.
 *
 * `name` overrides the attachment filename and the image content-ID.
 */
export type ContentSource =
  | { kind: "path"; path: string; name?: string }
  | { kind: "url"; url: string; name?: string }
  | { kind: "text"; text: string; name?: string }
  | { kind: "html"; html: string; name?: string }
  | { kind: "auto"; value: string; name?: string }

/** A bare string, or a single-entry `{ source: displayName }` mapping. */
export type ContentLike = string | Readonly<Record<string, string>>

export type ContentObject = {
  mainType: string
  subType: string

  /** Compression recorded from the file extension, e.g. `gzip`. */
  encoding?: string

  payload: Uint8Array

  /** Payload decoded as UTF-8 without errors. */
  textual: boolean

  filename?: string
  contentId?: string
}
