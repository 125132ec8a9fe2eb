import type {
  SmtpChannel,
  SmtpConnector,
  SmtpCredentials,
  SmtpEndpoint,
  SmtpEnvelope,
  SmtpTransmitResult,
} from "../../ports/smtp"

export type Transmission = {
  envelope: SmtpEnvelope
  raw: Uint8Array
}

/**
 * In-process SMTP server stand-in. Records every call in `events` and fails
 * operations from queued errors, one error per call.
 */
export class FakeSmtpConnector implements SmtpConnector {
  readonly events: string[] = []
  readonly endpoints: SmtpEndpoint[] = []
  readonly transmissions: Transmission[] = []

  /** Whether channels report TLS after connecting. */
  secure = true

  private readonly connectFailures: unknown[] = []
  private readonly authFailures: unknown[] = []
  private readonly transmitFailures: unknown[] = []

  failConnect(...errors: unknown[]): this {
    this.connectFailures.push(...errors)
    return this
  }

  failAuth(...errors: unknown[]): this {
    this.authFailures.push(...errors)
    return this
  }

  failTransmit(...errors: unknown[]): this {
    this.transmitFailures.push(...errors)
    return this
  }

  async connect(endpoint: SmtpEndpoint): Promise<SmtpChannel> {
    this.events.push("connect")
    this.endpoints.push(endpoint)

    const failure = this.connectFailures.shift()
    if (failure !== undefined) throw failure

    return new FakeSmtpChannel(this, this.secure)
  }

  /** @internal */
  nextAuthFailure(): unknown {
    return this.authFailures.shift()
  }

  /** @internal */
  nextTransmitFailure(): unknown {
    return this.transmitFailures.shift()
  }
}

class FakeSmtpChannel implements SmtpChannel {
  constructor(
    private readonly server: FakeSmtpConnector,
    readonly secure: boolean,
  ) {}

  async authenticate(credentials: SmtpCredentials): Promise<void> {
    this.server.events.push(`auth ${credentials.user}:${credentials.password}`)

    const failure = this.server.nextAuthFailure()
    if (failure !== undefined) throw failure
  }

  async transmit(envelope: SmtpEnvelope, raw: Uint8Array): Promise<SmtpTransmitResult> {
    this.server.events.push(`transmit ${envelope.to.join(",")}`)

    const failure = this.server.nextTransmitFailure()
    if (failure !== undefined) throw failure

    this.server.transmissions.push({ envelope, raw })

    return { accepted: [...envelope.to], rejected: [], response: "250 2.0.0 OK" }
  }

  async quit(): Promise<void> {
    this.server.events.push("quit")
  }
}
