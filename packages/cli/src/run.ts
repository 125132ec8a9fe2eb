import os from "node:os"
import { type Clock, SystemClock } from "@postline/clock"
import { createPinoLogger, type Logger } from "@postline/logger"
import {
  type CredentialPrompt,
  FetchHttpFetcher,
  InquirerCredentialPrompt,
  isDelivered,
  isMailError,
  Mailer,
  NodeHtmlParserDetector,
  NodemailerSmtpConnector,
  type SmtpConnector,
} from "@postline/mail"
import { createPasswordStore, JsonFileSecretVault } from "@postline/secrets"
import { type CliArgs, parseArgs, UsageError } from "./args"
import { ConfigValidationError } from "./config/core/load-config"
import { loadMailConfig, type MailConfig } from "./config/mail-config"
import { readIdentityFile } from "./identity"

export const ExitCodes = {
  Delivered: 0,
  NotDelivered: 1,
  Usage: 2,
} as const

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes]

/** Process-level collaborators; each defaults to the real implementation. */
export type RunDeps = {
  env?: Record<string, string | undefined>
  cwd?: string
  home?: string
  clock?: Clock
  logger?: Logger
  connector?: SmtpConnector
  fetch?: typeof fetch
  prompt?: CredentialPrompt
  report?: (line: string) => void
}

/**
 * Log in, send one message built from the command line and close.
 * Resolves to the process exit code.
 */
export async function run(argv: readonly string[], deps: RunDeps = {}): Promise<ExitCode> {
  const report = deps.report ?? ((line: string) => process.stderr.write(`${line}\n`))

  let setup: { args: CliArgs; config: MailConfig }

  try {
    setup = await prepare(argv, deps)
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigValidationError) {
      report(err.message)
      return ExitCodes.Usage
    }
    throw err
  }

  const { args, config } = setup

  const logger =
    deps.logger ??
    createPinoLogger({}, { level: config.log.level, prettify: config.log.prettify }, {
      service: "postline",
    })

  const user = args.user ?? (await readIdentityFile(config.userFile))

  if (user === null) {
    report(`No sender given: pass -user or write an address to ${config.userFile}`)
    return ExitCodes.Usage
  }

  const clock = deps.clock ?? new SystemClock()

  try {
    const mailer = await Mailer.login(
      {
        connector: deps.connector ?? new NodemailerSmtpConnector({ logger }),
        passwords: createPasswordStore(
          new JsonFileSecretVault({ clock }, { path: config.secretsFile }),
        ),
        prompt: deps.prompt ?? new InquirerCredentialPrompt(),
        clock,
        logger,
        fetcher: new FetchHttpFetcher(
          { ...(deps.fetch && { fetch: deps.fetch }) },
          { timeoutMs: config.fetchTimeoutMs },
        ),
        htmlDetector: new NodeHtmlParserDetector(),
      },
      {
        user,
        ...(args.password !== undefined && { password: args.password }),
        host: config.smtp.host,
        port: config.smtp.port,
        startTls: config.smtp.startTls,
        defaultDomain: config.defaultDomain,
        backoffUnitMs: config.backoffUnitMs,
      },
    )

    try {
      const result = await mailer.send({
        ...(args.to && { to: args.to }),
        ...(args.subject && { subject: args.subject }),
        ...(args.contents && { contents: args.contents }),
      })

      if (!isDelivered(result)) {
        report(`Message not delivered (${result.status})`)
        return ExitCodes.NotDelivered
      }

      return ExitCodes.Delivered
    } finally {
      await mailer.close()
    }
  } catch (err) {
    if (!isMailError(err)) throw err

    logger.error("Send failed", { err })
    report(err.message)
    return ExitCodes.NotDelivered
  }
}

async function prepare(
  argv: readonly string[],
  deps: RunDeps,
): Promise<{ args: CliArgs; config: MailConfig }> {
  const args = parseArgs(argv)
  const { config } = await loadMailConfig({
    home: deps.home ?? os.homedir(),
    ...(deps.cwd && { cwd: deps.cwd }),
    ...(deps.env && { env: deps.env }),
  })

  return { args, config }
}
