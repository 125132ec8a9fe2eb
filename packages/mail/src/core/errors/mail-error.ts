export type MailErrorContext = Readonly<Record<string, unknown>>

export const MailErrorCodes = {
  InvalidAddress: "invalid_address",
  ConnectionClosed: "connection_closed",
  AuthFailed: "auth_failed",
  ConnectFailed: "connect_failed",
  TransientDisconnect: "transient_disconnect",
  PermanentReject: "permanent_reject",
} as const

export type MailErrorCode = (typeof MailErrorCodes)[keyof typeof MailErrorCodes]

export type MailErrorOptions = Readonly<{
  context?: MailErrorContext
  cause?: unknown
}>

export type SerializedMailError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  timestamp: string
  cause?: SerializedMailError
}>

export abstract class MailError<C extends MailErrorCode = MailErrorCode> extends Error {
  abstract readonly code: C
  abstract readonly isRetryable: boolean

  readonly context: MailErrorContext
  readonly timestamp: Date

  constructor(message: string, options: MailErrorOptions = {}) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.context = Object.freeze({ ...options.context })
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedMailError {
    return serializeMailError(this)
  }
}

/** Malformed or structurally wrong address input. */
export class InvalidAddressError extends MailError<"invalid_address"> {
  readonly code = MailErrorCodes.InvalidAddress
  readonly isRetryable = false
}

/** Operation attempted on a closed session; log in again. */
export class ConnectionClosedError extends MailError<"connection_closed"> {
  readonly code = MailErrorCodes.ConnectionClosed
  readonly isRetryable = false
}

/** Credentials missing or rejected by the server. */
export class AuthError extends MailError<"auth_failed"> {
  readonly code = MailErrorCodes.AuthFailed
  readonly isRetryable = false
}

/** Transport could not be opened or secured. */
export class ConnectError extends MailError<"connect_failed"> {
  readonly code = MailErrorCodes.ConnectFailed
  readonly isRetryable = false
}

/** Connection dropped mid-send, timed out, or the server answered 421. */
export class TransientDisconnectError extends MailError<"transient_disconnect"> {
  readonly code = MailErrorCodes.TransientDisconnect
  readonly isRetryable = true
}

/** Server refused the message or every recipient. */
export class PermanentRejectError extends MailError<"permanent_reject"> {
  readonly code = MailErrorCodes.PermanentReject
  readonly isRetryable = false
}

export function isMailError(err: unknown): err is MailError {
  return err instanceof MailError
}

/**
 * Serialize a mail error (or any thrown value) for structured logs.
 */
export function serializeMailError(err: unknown): SerializedMailError {
  if (err instanceof MailError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeMailError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "code" in err && typeof err.code === "string" ? err.code : "unknown",
      message: err.message,
      context: {},
      isRetryable: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeMailError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }
}
