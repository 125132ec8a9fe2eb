export type SecretKey = string

export interface SecretValue {
  value: string
  updatedAt?: Date
}

/**
 * Minimal read-only secret access.
 */
export interface ReadableSecretVault {
  get(key: SecretKey): Promise<SecretValue | null>
  exists(key: SecretKey): Promise<boolean>
}

/**
 * Full read-write secret vault.
 */
export interface SecretVault extends ReadableSecretVault {
  set(key: SecretKey, value: string): Promise<void>
  delete(key: SecretKey): Promise<void>
}
