import type { ContentLike, ContentSource } from "../../ports/content"

const KINDS = new Set(["path", "url", "text", "html", "auto"])

/**
 * Lift loose content input into a `ContentSource`. A single-entry mapping
 * names the item: `{ "chart.png": "q3-chart" }`.
 */
export function toContentSource(value: ContentSource | ContentLike): ContentSource {
  if (typeof value === "string") return { kind: "auto", value }

  if (isContentSource(value)) return value

  const entries = Object.entries(value)
  const [first] = entries

  if (entries.length !== 1 || !first) {
    throw new TypeError(
      `Named content must be a single-entry mapping (got ${entries.length} entries)`,
    )
  }

  const [source, name] = first
  return { kind: "auto", value: source, name }
}

function isContentSource(value: ContentSource | Exclude<ContentLike, string>): value is ContentSource {
  return typeof value.kind === "string" && KINDS.has(value.kind) && Object.keys(value).length > 1
}
