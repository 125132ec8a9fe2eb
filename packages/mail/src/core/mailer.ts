import type { ResolveAddressesRequest } from "../ports/address"
import type { DeliveryResult, MessagePreview } from "../ports/delivery"
import type { HtmlDetector } from "../ports/html-detector"
import type { HttpFetcher } from "../ports/http-fetcher"
import { type BuildMessageRequest, MessageComposer } from "./message/message-composer"
import { serializeMessage } from "./message/serialize-message"
import {
  type LoginOptions,
  SessionManager,
  type SessionManagerDeps,
} from "./session/session-manager"

export type MailerDeps = SessionManagerDeps & {
  fetcher: HttpFetcher
  htmlDetector?: HtmlDetector
}

export type SendRequest = ResolveAddressesRequest &
  BuildMessageRequest & {
    /** Build and serialize without transmitting. */
    previewOnly?: boolean
  }

/**
 * Session plus composer: resolve addresses, build, serialize, send.
 */
export class Mailer {
  constructor(
    readonly session: SessionManager,
    readonly composer: MessageComposer,
  ) {}

  static async login(deps: MailerDeps, options: LoginOptions): Promise<Mailer> {
    const session = await SessionManager.login(deps, options)
    const composer = new MessageComposer({
      session,
      fetcher: deps.fetcher,
      ...(deps.htmlDetector && { htmlDetector: deps.htmlDetector }),
      logger: deps.logger,
    })

    return new Mailer(session, composer)
  }

  async send(request: SendRequest): Promise<DeliveryResult | MessagePreview> {
    const addresses = this.composer.resolveAddresses(request)

    if (addresses.recipients.length === 0) {
      return { status: "skipped", recipients: [] }
    }

    const message = await this.composer.buildMessage(addresses, request)
    const raw = await serializeMessage(message)

    if (request.previewOnly) {
      return { status: "preview", addresses, raw }
    }

    return this.session.send(addresses.recipients, raw)
  }

  clearCache(): void {
    this.composer.clearCache()
  }

  resendUnsent(): Promise<DeliveryResult[]> {
    return this.session.resendUnsent()
  }

  close(): Promise<void> {
    return this.session.close()
  }
}
