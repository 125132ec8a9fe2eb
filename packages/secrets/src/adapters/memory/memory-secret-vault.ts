import type { Clock } from "@postline/clock"
import type { SecretKey, SecretValue, SecretVault } from "../../ports/secret-vault"

export type MemorySecretVaultDeps = {
  clock: Clock
}

/**
 * In-memory secret vault for tests and throwaway sessions.
 */
export class MemorySecretVault implements SecretVault {
  private readonly secrets = new Map<SecretKey, SecretValue>()

  constructor(private readonly deps: MemorySecretVaultDeps) {}

  async get(key: SecretKey): Promise<SecretValue | null> {
    const stored = this.secrets.get(key)

    return stored ? { ...stored } : null
  }

  async exists(key: SecretKey): Promise<boolean> {
    return this.secrets.has(key)
  }

  async set(key: SecretKey, value: string): Promise<void> {
    if (value.length === 0) {
      throw new Error(`Secret value must not be empty: ${key}`)
    }

    this.secrets.set(key, { value, updatedAt: this.deps.clock.now() })
  }

  async delete(key: SecretKey): Promise<void> {
    this.secrets.delete(key)
  }
}
