export { type CliArgs, parseArgs, UsageError } from "./args"
export { ConfigValidationError, type LoadedConfig, loadConfig } from "./config/core/load-config"
export { DotenvSource, type DotenvSourceOptions } from "./config/adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/adapters/env/env-source"
export {
  DEFAULT_FETCH_TIMEOUT_MS,
  ENV_PREFIX,
  loadMailConfig,
  type LoadMailConfigOptions,
  type MailConfig,
  mailEnvSchema,
} from "./config/mail-config"
export type { ConfigSource } from "./config/ports/source"
export { readIdentityFile } from "./identity"
export { type ExitCode, ExitCodes, run, type RunDeps } from "./run"
