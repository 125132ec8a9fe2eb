import type { ConnectionOptions } from "node:tls"

/**
 * `true` requires STARTTLS with default options, an options object requires
 * it with those TLS options, `false` skips it.
 */
export type StartTlsMode = boolean | ConnectionOptions

export type SmtpEndpoint = {
  host: string
  port: number
  startTls: StartTlsMode
}

export type SmtpCredentials = {
  user: string
  password: string
}

export type SmtpEnvelope = {
  from: string
  to: readonly string[]
}

export type SmtpTransmitResult = {
  accepted: string[]
  rejected: string[]
  response: string
}

/**
 * An open SMTP connection. Failures surface as mail errors: `AuthError`
 * from `authenticate`, `TransientDisconnectError` or `PermanentRejectError`
 * from `transmit`.
 */
export interface SmtpChannel {
  /** True once the connection runs over TLS. */
  readonly secure: boolean

  authenticate(credentials: SmtpCredentials): Promise<void>
  transmit(envelope: SmtpEnvelope, raw: Uint8Array): Promise<SmtpTransmitResult>
  quit(): Promise<void>
}

/**
 * Opens channels. When STARTTLS is requested the connector runs
 * `EHLO`, `STARTTLS` and `EHLO` again before resolving.
 */
export interface SmtpConnector {
  connect(endpoint: SmtpEndpoint): Promise<SmtpChannel>
}
