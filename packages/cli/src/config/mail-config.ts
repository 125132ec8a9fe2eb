import path from "node:path"
import { type LogLevelName, logLevelNames } from "@postline/logger"
import {
  DEFAULT_BACKOFF_UNIT_MS,
  DEFAULT_MAIL_DOMAIN,
  DEFAULT_SMTP_HOST,
  DEFAULT_SMTP_PORT,
} from "@postline/mail"
import { z } from "zod"
import { DotenvSource } from "./adapters/dotenv/dotenv-source"
import { EnvSource } from "./adapters/env/env-source"
import { type LoadedConfig, loadConfig } from "./core/load-config"

export const ENV_PREFIX = "POSTLINE_"
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000

export type MailConfig = {
  smtp: {
    host: string
    port: number
    startTls: boolean
  }
  log: {
    level: LogLevelName
    prettify: boolean
  }
  backoffUnitMs: number

  /** Limit on each remote content download. */
  fetchTimeoutMs: number
  secretsFile: string
  userFile: string
  defaultDomain: string
}

export type LoadMailConfigOptions = {
  env?: Record<string, string | undefined>
  cwd?: string
  home: string
}

/** Environment schema; keys are read without the `POSTLINE_` prefix. */
export function mailEnvSchema(home: string) {
  return z.object({
    SMTP_HOST: z.string().min(1).default(DEFAULT_SMTP_HOST),
    SMTP_PORT: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_SMTP_PORT),
    SMTP_STARTTLS: z.stringbool().default(true),
    LOG_LEVEL: z.enum(logLevelNames).default("warn"),
    LOG_PRETTY: z.stringbool().default(false),
    BACKOFF_UNIT_MS: z.coerce.number().min(0).default(DEFAULT_BACKOFF_UNIT_MS),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
    SECRETS_FILE: z.string().min(1).default(path.join(home, ".config", "postline", "secrets.json")),
    USER_FILE: z.string().min(1).default(path.join(home, ".postline")),
    DEFAULT_DOMAIN: z.string().min(1).default(DEFAULT_MAIL_DOMAIN),
  })
}

export type MailEnv = z.infer<ReturnType<typeof mailEnvSchema>>

/**
 * Read `POSTLINE_*` settings from `.env` in `cwd`, then the process
 * environment.
 */
export async function loadMailConfig(
  options: LoadMailConfigOptions,
): Promise<{ config: MailConfig; loaded: LoadedConfig<MailEnv> }> {
  const loaded = await loadConfig(mailEnvSchema(options.home), [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: ENV_PREFIX,
      ...(options.cwd && { cwd: options.cwd }),
    }),
    new EnvSource({ prefix: ENV_PREFIX, ...(options.env && { env: options.env }) }),
  ])

  return { config: toMailConfig(loaded.value), loaded }
}

function toMailConfig(env: MailEnv): MailConfig {
  return {
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      startTls: env.SMTP_STARTTLS,
    },
    log: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    backoffUnitMs: env.BACKOFF_UNIT_MS,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    secretsFile: env.SECRETS_FILE,
    userFile: env.USER_FILE,
    defaultDomain: env.DEFAULT_DOMAIN,
  }
}
