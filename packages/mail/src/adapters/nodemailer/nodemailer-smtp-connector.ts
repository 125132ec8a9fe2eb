import type { Logger } from "@postline/logger"
import SMTPConnection from "nodemailer/lib/smtp-connection"
import type {
  SmtpChannel,
  SmtpConnector,
  SmtpCredentials,
  SmtpEndpoint,
  SmtpEnvelope,
  SmtpTransmitResult,
} from "../../ports/smtp"
import { mapSmtpError, type SmtpPhase } from "./map-smtp-error"

export type NodemailerSmtpConnectorDeps = {
  logger: Logger

  /** Builds the underlying connection; replaced in tests. */
  createConnection?: (options: SMTPConnection.Options) => SMTPConnection
}

export type NodemailerSmtpConnectorOptions = {
  connectionTimeoutMs?: number
  greetingTimeoutMs?: number
  socketTimeoutMs?: number
}

/**
 * SMTP connector on nodemailer's `SMTPConnection`. STARTTLS is required
 * unless the endpoint disables it, so `connect` resolves only after the
 * upgraded `EHLO`.
 */
export class NodemailerSmtpConnector implements SmtpConnector {
  constructor(
    private readonly deps: NodemailerSmtpConnectorDeps,
    private readonly opts: NodemailerSmtpConnectorOptions = {},
  ) {}

  async connect(endpoint: SmtpEndpoint): Promise<SmtpChannel> {
    const options = this.toOptions(endpoint)
    const connection = this.deps.createConnection
      ? this.deps.createConnection(options)
      : new SMTPConnection(options)
    const logger = this.deps.logger.child({ host: endpoint.host, port: endpoint.port })

    // Errors outside a pending operation would otherwise crash the process.
    connection.on("error", (err: Error) => {
      logger.debug("SMTP connection error", { err })
    })

    await runOperation(connection, "connect", (done) => {
      connection.connect(() => done(null, undefined))
    })

    return new NodemailerSmtpChannel(connection)
  }

  private toOptions(endpoint: SmtpEndpoint): SMTPConnection.Options {
    const { startTls } = endpoint

    return {
      host: endpoint.host,
      port: endpoint.port,
      secure: false,
      ...(startTls === false ? { ignoreTLS: true } : { requireTLS: true }),
      ...(typeof startTls === "object" && { tls: startTls }),
      ...(this.opts.connectionTimeoutMs !== undefined && {
        connectionTimeout: this.opts.connectionTimeoutMs,
      }),
      ...(this.opts.greetingTimeoutMs !== undefined && {
        greetingTimeout: this.opts.greetingTimeoutMs,
      }),
      ...(this.opts.socketTimeoutMs !== undefined && {
        socketTimeout: this.opts.socketTimeoutMs,
      }),
    }
  }
}

class NodemailerSmtpChannel implements SmtpChannel {
  constructor(private readonly connection: SMTPConnection) {}

  get secure(): boolean {
    return this.connection.secure
  }

  async authenticate(credentials: SmtpCredentials): Promise<void> {
    const { user, password } = credentials

    await runOperation(this.connection, "auth", (done) => {
      this.connection.login({ user, credentials: { user, pass: password } }, (err) =>
        done(err ?? null, undefined),
      )
    })
  }

  async transmit(envelope: SmtpEnvelope, raw: Uint8Array): Promise<SmtpTransmitResult> {
    const info = await runOperation<SMTPConnection.SentMessageInfo>(
      this.connection,
      "send",
      (done) => {
        this.connection.send(
          { from: envelope.from, to: [...envelope.to] },
          Buffer.from(raw),
          (err, result) => done(err, result),
        )
      },
    )

    return {
      accepted: info.accepted.map(String),
      rejected: info.rejected.map(String),
      response: info.response,
    }
  }

  async quit(): Promise<void> {
    this.connection.quit()
  }
}

type Done<T> = (err: Error | null, value: T) => void

/**
 * Run one callback-style operation, settling on its callback, on an
 * `error` event, or when the server hangs up first.
 */
function runOperation<T>(
  connection: SMTPConnection,
  phase: SmtpPhase,
  start: (done: Done<T>) => void,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false

    const detach = (): boolean => {
      if (settled) return false
      settled = true

      connection.removeListener("error", fail)
      connection.removeListener("end", hangUp)
      return true
    }

    const fail = (err: unknown) => {
      if (detach()) reject(mapSmtpError(err, phase))
    }

    const hangUp = () => {
      fail(Object.assign(new Error("Connection closed"), { code: "ECONNECTION" }))
    }

    connection.once("error", fail)
    connection.once("end", hangUp)

    start((err, value) => {
      if (err) fail(err)
      else if (detach()) resolve(value)
    })
  })
}
