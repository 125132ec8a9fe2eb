import type { Clock, Milliseconds } from "@postline/clock"
import type { Logger } from "@postline/logger"
import { createRetryExecutor, type DelayPolicy, type IRetryExecutor, linear } from "@postline/retry"
import type { PasswordStore } from "@postline/secrets"
import {
  ConnectError,
  ConnectionClosedError,
  InvalidAddressError,
  isMailError,
  TransientDisconnectError,
} from "../errors/mail-error"
import type { ComposerSession } from "../message/message-composer"
import type { CredentialPrompt } from "../../ports/credential-prompt"
import type { DeliveryResult } from "../../ports/delivery"
import type {
  SmtpChannel,
  SmtpConnector,
  SmtpCredentials,
  SmtpEndpoint,
  SmtpTransmitResult,
  StartTlsMode,
} from "../../ports/smtp"
import { resolvePassword } from "./resolve-password"

export const DEFAULT_SMTP_HOST = "smtp.gmail.com"
export const DEFAULT_SMTP_PORT = 587
export const DEFAULT_BACKOFF_UNIT_MS = 1000
export const SEND_ATTEMPTS = 3

export type SessionManagerDeps = {
  connector: SmtpConnector
  passwords: PasswordStore
  prompt?: CredentialPrompt
  clock: Clock
  logger: Logger
}

export type LoginOptions = {
  /** Mailbox, or a single-entry `{ address: displayName }` mapping. */
  user: string | Readonly<Record<string, string>>
  password?: string
  host?: string
  port?: number
  startTls?: StartTlsMode

  /** Appended to identities without `@` when looking up passwords. */
  defaultDomain?: string

  /** Backoff waits 3 then 6 of these between send attempts. */
  backoffUnitMs?: Milliseconds
}

export type UnsentMessage = {
  recipients: string[]
  raw: Uint8Array
}

type SessionState = {
  credentials: SmtpCredentials
  displayName: string
  endpoint: SmtpEndpoint
  backoff: DelayPolicy
  channel: SmtpChannel
}

/**
 * One authenticated SMTP session.
 *
 * Sends are retried on transient disconnects over a fresh connection;
 * messages that still fail wait in the unsent queue for `resendUnsent`.
 * Sessions are not safe for concurrent sends.
 */
export class SessionManager implements ComposerSession {
  private channel: SmtpChannel | null
  private closed = false
  private sent = 0
  private readonly unsent: UnsentMessage[] = []
  private readonly retry: IRetryExecutor
  private readonly logger: Logger

  private constructor(
    private readonly deps: SessionManagerDeps,
    private readonly state: SessionState,
    logger: Logger,
  ) {
    this.channel = state.channel
    this.retry = createRetryExecutor({ clock: deps.clock })
    this.logger = logger
  }

  /**
   * Resolve the password, connect (with STARTTLS unless disabled) and
   * authenticate.
   */
  static async login(deps: SessionManagerDeps, options: LoginOptions): Promise<SessionManager> {
    const { identity, displayName } = parseUser(options.user)

    const credentials = await resolvePassword(deps, {
      identity,
      ...(options.password !== undefined && { password: options.password }),
      ...(options.defaultDomain && { defaultDomain: options.defaultDomain }),
    })

    const endpoint: SmtpEndpoint = {
      host: options.host ?? DEFAULT_SMTP_HOST,
      port: options.port ?? DEFAULT_SMTP_PORT,
      startTls: options.startTls ?? true,
    }

    const logger = deps.logger.child({
      module: "mail.session",
      host: endpoint.host,
      port: endpoint.port,
      user: credentials.user,
    })

    const channel = await openChannel(deps.connector, endpoint, credentials, logger)
    logger.info("Connected to SMTP server")

    const backoff = linear({
      unit: options.backoffUnitMs ?? DEFAULT_BACKOFF_UNIT_MS,
      factor: 3,
    })

    return new SessionManager(
      deps,
      { credentials, displayName, endpoint, backoff, channel },
      logger,
    )
  }

  get user(): string {
    return this.state.credentials.user
  }

  get displayName(): string {
    return this.state.displayName
  }

  get sentCount(): number {
    return this.sent
  }

  get unsentCount(): number {
    return this.unsent.length
  }

  sendAllowed(): boolean {
    return !this.closed
  }

  /**
   * Transmit a serialized message. After three transient failures the
   * message is queued and a `queued` result returned; other failures throw.
   */
  async send(recipients: readonly string[], raw: Uint8Array): Promise<DeliveryResult> {
    this.assertOpen()

    if (recipients.length === 0) {
      throw new InvalidAddressError("At least one recipient is required")
    }

    const envelope = { from: this.user, to: [...recipients] }
    const log = this.logger.child({ recipients: envelope.to })

    const result = await this.retry.tryExecute<SmtpTransmitResult, unknown>(
      async () => {
        const channel = await this.ensureChannel()
        return channel.transmit(envelope, raw)
      },
      {
        maxAttempts: SEND_ATTEMPTS,
        delay: this.state.backoff,
        errorPredicate: {
          shouldRetry: (err) => err instanceof TransientDisconnectError,
        },
        observer: {
          onError: async (err, info) => {
            log.warn("Send interrupted, retrying on a new connection", {
              attempt: info.attemptsSoFar,
              retryInMs: info.nextDelayMs,
              err,
            })
            await this.discardChannel()
          },
          onExhausted: async (err) => {
            if (err instanceof TransientDisconnectError) await this.discardChannel()
          },
        },
      },
    )

    if (result.success) {
      this.sent++
      log.info("Message sent", { attempt: result.attempts })

      return {
        status: "sent",
        recipients: envelope.to,
        ...result.value,
        attempts: result.attempts,
      }
    }

    if (!result.exhausted) throw result.error

    this.unsent.push({ recipients: envelope.to, raw })
    log.error("Send failed after retries, message queued", {
      attempt: result.attempts,
      queued: this.unsent.length,
      err: result.error,
    })

    return {
      status: "queued",
      recipients: envelope.to,
      attempts: result.attempts,
      error: result.error,
    }
  }

  /**
   * Retry every message queued when the call starts, oldest first. Messages
   * that fail again go to the back of the queue. A non-retryable failure
   * stops the drain; the failing message returns to the front and the rest
   * stay queued behind it.
   */
  async resendUnsent(): Promise<DeliveryResult[]> {
    this.assertOpen()

    const pending = this.unsent.length
    const results: DeliveryResult[] = []

    for (let i = 0; i < pending; i++) {
      const entry = this.unsent.shift()
      if (!entry) break

      try {
        results.push(await this.send(entry.recipients, entry.raw))
      } catch (err) {
        this.unsent.unshift(entry)
        throw err
      }
    }

    return results
  }

  /** Quit and release the connection. Closing twice is a no-op. */
  async close(): Promise<void> {
    if (this.closed) return

    this.closed = true
    await this.discardChannel()

    this.logger.info("Closed SMTP session", {
      sent: this.sent,
      unsent: this.unsent.length,
    })
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ConnectionClosedError("Session is closed; log in again", {
        context: { user: this.user },
      })
    }
  }

  private async ensureChannel(): Promise<SmtpChannel> {
    if (this.channel) return this.channel

    const { endpoint, credentials } = this.state
    this.logger.info("Reconnecting to SMTP server")

    try {
      this.channel = await openChannel(this.deps.connector, endpoint, credentials, this.logger)
    } catch (err) {
      if (err instanceof ConnectError) {
        throw new TransientDisconnectError("Reconnect failed", {
          cause: err,
          context: { host: endpoint.host, port: endpoint.port },
        })
      }
      throw err
    }

    return this.channel
  }

  private async discardChannel(): Promise<void> {
    const channel = this.channel
    this.channel = null

    if (channel) await quitQuietly(channel, this.logger)
  }
}

function parseUser(user: LoginOptions["user"]): { identity: string; displayName: string } {
  if (typeof user === "string") return { identity: user, displayName: user }

  const entries = Object.entries(user)
  const [first] = entries

  if (entries.length !== 1 || !first) {
    throw new InvalidAddressError("User must be an address or a single-entry address-to-name mapping", {
      context: { entries: entries.length },
    })
  }

  const [identity, displayName] = first
  return { identity, displayName }
}

async function openChannel(
  connector: SmtpConnector,
  endpoint: SmtpEndpoint,
  credentials: SmtpCredentials,
  logger: Logger,
): Promise<SmtpChannel> {
  let channel: SmtpChannel

  try {
    channel = await connector.connect(endpoint)
  } catch (err) {
    throw toConnectError(err, endpoint)
  }

  try {
    if (endpoint.startTls !== false && !channel.secure) {
      throw new ConnectError("STARTTLS did not secure the connection", {
        context: { host: endpoint.host, port: endpoint.port },
      })
    }

    await channel.authenticate(credentials)
  } catch (err) {
    await quitQuietly(channel, logger)
    throw toConnectError(err, endpoint)
  }

  return channel
}

function toConnectError(err: unknown, endpoint: SmtpEndpoint): Error {
  if (isMailError(err)) return err

  return new ConnectError(`Could not connect to ${endpoint.host}:${endpoint.port}`, {
    cause: err,
    context: { host: endpoint.host, port: endpoint.port },
  })
}

async function quitQuietly(channel: SmtpChannel, logger: Logger): Promise<void> {
  try {
    await channel.quit()
  } catch (err) {
    logger.debug("QUIT failed on a discarded connection", { err })
  }
}
