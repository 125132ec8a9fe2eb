import {
  AuthError,
  ConnectError,
  isMailError,
  type MailError,
  PermanentRejectError,
  TransientDisconnectError,
} from "../../core/errors/mail-error"

export type SmtpPhase = "connect" | "auth" | "send"

/** nodemailer codes for a dropped or stalled connection. */
const DISCONNECT_CODES = new Set(["ECONNECTION", "ETIMEDOUT", "ESOCKET", "ECONNRESET"])

const SERVICE_UNAVAILABLE = 421

type SmtpErrorFields = {
  code?: string
  responseCode?: number
  response?: string
  command?: string
}

/**
 * Translate a nodemailer SMTP error into the mail error taxonomy.
 */
export function mapSmtpError(err: unknown, phase: SmtpPhase): MailError {
  if (isMailError(err)) return err

  const fields = readFields(err)
  const message = err instanceof Error ? err.message : String(err)
  const options = {
    cause: err,
    context: {
      phase,
      ...(fields.code && { code: fields.code }),
      ...(fields.responseCode !== undefined && { responseCode: fields.responseCode }),
      ...(fields.command && { command: fields.command }),
    },
  }

  if (phase === "connect") return new ConnectError(message, options)

  if (fields.code === "EAUTH") return new AuthError(message, options)

  const disconnected =
    fields.responseCode === SERVICE_UNAVAILABLE ||
    (fields.code !== undefined && DISCONNECT_CODES.has(fields.code))

  if (phase === "auth") {
    return disconnected ? new ConnectError(message, options) : new AuthError(message, options)
  }

  return disconnected
    ? new TransientDisconnectError(message, options)
    : new PermanentRejectError(message, options)
}

function readFields(err: unknown): SmtpErrorFields {
  if (typeof err !== "object" || err === null) return {}

  return {
    ...("code" in err && typeof err.code === "string" && { code: err.code }),
    ...("responseCode" in err &&
      typeof err.responseCode === "number" && { responseCode: err.responseCode }),
    ...("response" in err && typeof err.response === "string" && { response: err.response }),
    ...("command" in err && typeof err.command === "string" && { command: err.command }),
  }
}
