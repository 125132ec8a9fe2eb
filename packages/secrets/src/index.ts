export {
  type JsonFileSecretVaultDeps,
  type JsonFileSecretVaultOptions,
  JsonFileSecretVault,
} from "./adapters/fs/json-file-secret-vault"
export {
  type MemorySecretVaultDeps,
  MemorySecretVault,
} from "./adapters/memory/memory-secret-vault"
export {
  createPasswordStore,
  DEFAULT_PASSWORD_SERVICE,
  type PasswordStore,
  type PasswordStoreOptions,
  passwordKey,
} from "./core/password-store"
export type {
  ReadableSecretVault,
  SecretKey,
  SecretValue,
  SecretVault,
} from "./ports/secret-vault"
