import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters decide how to honor these; they only describe policy.
 */
export type LoggerOptions = {
  /** Minimum log level to emit. */
  level: LogLevelName

  /**
   * Pretty-print for humans. Meant for interactive CLI use; structured JSON
   * is emitted otherwise.
   */
  prettify?: boolean

  /**
   * Extra field paths to censor, on top of the credential fields that are
   * always redacted.
   */
  redact?: string[]
}
