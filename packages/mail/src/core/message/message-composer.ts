import type { Logger } from "@postline/logger"
import { ConnectionClosedError } from "../errors/mail-error"
import type { AddressSet, ResolveAddressesRequest } from "../../ports/address"
import type { ContentLike, ContentObject, ContentSource } from "../../ports/content"
import type { HtmlDetector } from "../../ports/html-detector"
import type { HttpFetcher } from "../../ports/http-fetcher"
import type { ComposedMessage, MimePart } from "../../ports/message"
import { resolveAddresses } from "../addresses/resolve-addresses"
import { classifyContent } from "../content/classify-content"
import { ContentCache } from "../content/content-cache"
import { contentIdFor } from "../content/content-id"
import { toContentSource } from "../content/to-content-source"

export const MIME_PREAMBLE = "You need a MIME enabled mail reader to see this message."

/** The parts of a session the composer reads. */
export interface ComposerSession {
  readonly user: string
  readonly displayName: string
  sendAllowed(): boolean
}

export type MessageComposerDeps = {
  session: ComposerSession
  fetcher: HttpFetcher
  htmlDetector?: HtmlDetector
  logger: Logger
}

export type ContentItem = ContentSource | ContentLike

export type BuildMessageRequest = {
  subject?: string | readonly string[]
  contents?: ContentItem | readonly ContentItem[]

  /** Reuse classified content from earlier messages of this session. */
  useCache?: boolean
}

export class MessageComposer {
  private readonly cache = new ContentCache()

  constructor(private readonly deps: MessageComposerDeps) {}

  resolveAddresses(request: ResolveAddressesRequest): AddressSet {
    const { session, logger } = this.deps

    return resolveAddresses(
      { owner: { user: session.user, displayName: session.displayName }, logger },
      request,
    )
  }

  classifyContent(item: ContentItem): Promise<ContentObject> {
    return classifyContent(this.deps, toContentSource(item))
  }

  /**
   * Assemble a message. Images are embedded: each gets an `<img>` fragment
   * in the alternative container and an inline part in the mixed one.
   */
  async buildMessage(
    addresses: AddressSet,
    request: BuildMessageRequest = {},
  ): Promise<ComposedMessage> {
    const { session } = this.deps

    if (!session.sendAllowed()) {
      throw new ConnectionClosedError("Session is closed; log in again", {
        context: { user: session.user },
      })
    }

    const alternative: MimePart[] = []
    const mixed: MimePart[] = []
    let hasImages = false

    for (const item of toItemList(request.contents)) {
      const object = await this.classify(toContentSource(item), request.useCache ?? false)

      if (object.mainType === "image") {
        const contentId = object.contentId ?? contentIdFor(object.filename ?? "image")

        alternative.push({
          contentType: "text/html",
          content: `<img src="cid:${escapeAttribute(contentId)}" title="${escapeAttribute(contentId)}"/>`,
        })
        mixed.push({
          ...toPart(object),
          transferEncoding: "base64",
          disposition: "inline",
          contentId,
        })
        hasImages = true
      } else {
        mixed.push(toPart(object))
      }
    }

    const subject = toSubject(request.subject)

    return {
      from: {
        email: session.user,
        ...(session.displayName !== session.user && { name: session.displayName }),
      },
      ...(subject && { subject }),
      addresses,
      alternative,
      mixed,
      ...(hasImages && { preamble: MIME_PREAMBLE }),
    }
  }

  /** Forget cached content so the next cached build reloads it. */
  clearCache(): void {
    this.cache.clear()
  }

  private classify(source: ContentSource, useCache: boolean): Promise<ContentObject> {
    if (!useCache) return classifyContent(this.deps, source)

    return this.cache.getOrLoad(source, (s) => classifyContent(this.deps, s))
  }
}

function toItemList(contents: BuildMessageRequest["contents"]): readonly ContentItem[] {
  if (contents === undefined) return []
  if (isItemList(contents)) return contents

  return [contents]
}

function isItemList(value: ContentItem | readonly ContentItem[]): value is readonly ContentItem[] {
  return Array.isArray(value)
}

function toSubject(subject: BuildMessageRequest["subject"]): string | undefined {
  const text = typeof subject === "string" ? subject : subject?.join(" ")

  return text ? text : undefined
}

function toPart(object: ContentObject): MimePart {
  const contentType = `${object.mainType}/${object.subType}`

  if (object.filename === undefined) {
    return { contentType, content: new TextDecoder().decode(object.payload) }
  }

  return {
    contentType,
    content: object.payload,
    disposition: "attachment",
    filename: object.filename,
  }
}

function escapeAttribute(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll('"', "&quot;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
}
