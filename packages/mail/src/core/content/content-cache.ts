import type { ContentObject, ContentSource } from "../../ports/content"

/**
 * Classified content keyed by the literal source. Entries are never
 * refreshed, so a URL keeps the bytes of its first fetch.
 */
export class ContentCache {
  private readonly entries = new Map<string, ContentObject>()

  async getOrLoad(
    source: ContentSource,
    load: (source: ContentSource) => Promise<ContentObject>,
  ): Promise<ContentObject> {
    const key = cacheKey(source)
    const cached = this.entries.get(key)
    if (cached) return cached

    const loaded = await load(source)
    this.entries.set(key, loaded)

    return loaded
  }

  clear(): void {
    this.entries.clear()
  }
}

function cacheKey(source: ContentSource): string {
  return JSON.stringify([source.kind, literalOf(source), source.name ?? null])
}

function literalOf(source: ContentSource): string {
  switch (source.kind) {
    case "path":
      return source.path
    case "url":
      return source.url
    case "text":
      return source.text
    case "html":
      return source.html
    case "auto":
      return source.value
  }
}
