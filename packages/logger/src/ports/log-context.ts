export type LogContext = {
  service: string
  module: string
  env: string

  /** SMTP relay the session talks to. */
  host: string
  port: number

  /** Authenticated mailbox. */
  user: string

  recipients: string[]
  attempt: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
