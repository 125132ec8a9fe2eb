import { readFile, stat } from "node:fs/promises"
import { basename, posix } from "node:path"
import type { Logger } from "@postline/logger"
import type { ContentObject, ContentSource } from "../../ports/content"
import type { HtmlDetector } from "../../ports/html-detector"
import type { HttpFetcher } from "../../ports/http-fetcher"
import { contentIdFor } from "./content-id"
import { guessMimeType, parseContentType } from "./mime-lookup"

export type ClassifyContentDeps = {
  fetcher: HttpFetcher
  htmlDetector?: HtmlDetector
  logger: Logger
}

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"])

/** Errors from `stat` that mean "this string is not a file path". */
const NOT_A_PATH_CODES = new Set([
  "ENOENT",
  "ENOTDIR",
  "ENAMETOOLONG",
  "EINVAL",
  "ERR_INVALID_ARG_VALUE",
])

/**
 * Resolve a content item to its MIME type and payload.
 *
 * `auto` items try, in order: an existing local file, an http(s) URL that
 * fetches successfully, and literal text. Literal text is `text/html` only
 * when an HTML detector is present and finds markup.
 */
export async function classifyContent(
  deps: ClassifyContentDeps,
  source: ContentSource,
): Promise<ContentObject> {
  switch (source.kind) {
    case "path":
      return fromFile(source.path, source.name)
    case "url":
      return fromUrl(deps, new URL(source.url), source.name)
    case "text":
      return fromLiteral(source.text, "plain")
    case "html":
      return fromLiteral(source.html, "html")
    case "auto":
      return classifyAuto(deps, source.value, source.name)
  }
}

async function classifyAuto(
  deps: ClassifyContentDeps,
  value: string,
  name: string | undefined,
): Promise<ContentObject> {
  if (await isFile(value)) return fromFile(value, name)

  const url = toFetchableUrl(value)

  if (url) {
    try {
      return await fromUrl(deps, url, name)
    } catch (err) {
      deps.logger.debug("Fetch failed, treating content as literal text", {
        url: url.href,
        err,
      })
    }
  }

  const html = deps.htmlDetector?.containsMarkup(value) ?? false

  return fromLiteral(value, html ? "html" : "plain")
}

async function fromFile(path: string, name: string | undefined): Promise<ContentObject> {
  const payload = new Uint8Array(await readFile(path))
  const type = guessMimeType(path)
  const sourceName = basename(path)

  return {
    ...type,
    payload,
    textual: isUtf8(payload),
    filename: name ?? sourceName,
    ...(type.mainType === "image" && { contentId: contentIdFor(sourceName, name) }),
  }
}

async function fromUrl(
  deps: ClassifyContentDeps,
  url: URL,
  name: string | undefined,
): Promise<ContentObject> {
  const response = await deps.fetcher.get(url)
  const fromHeader = response.contentType ? parseContentType(response.contentType) : null
  const type = fromHeader ?? guessMimeType(url.pathname)
  const sourceName = posix.basename(url.pathname) || url.hostname

  return {
    ...type,
    payload: response.body,
    textual: isUtf8(response.body),
    filename: name ?? sourceName,
    ...(type.mainType === "image" && { contentId: contentIdFor(sourceName, name) }),
  }
}

function fromLiteral(text: string, subType: "plain" | "html"): ContentObject {
  return {
    mainType: "text",
    subType,
    payload: new TextEncoder().encode(text),
    textual: true,
  }
}

async function isFile(value: string): Promise<boolean> {
  try {
    return (await stat(value)).isFile()
  } catch (err) {
    if (isNotAPath(err)) return false
    throw err
  }
}

function isNotAPath(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    NOT_A_PATH_CODES.has(err.code)
  )
}

function toFetchableUrl(value: string): URL | null {
  if (!URL.canParse(value)) return null

  const url = new URL(value)
  return FETCHABLE_PROTOCOLS.has(url.protocol) ? url : null
}

function isUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder("utf-8", { fatal: true }).decode(bytes)
    return true
  } catch {
    return false
  }
}
