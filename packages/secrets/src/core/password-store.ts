import type { SecretKey, SecretVault } from "../ports/secret-vault"

export const DEFAULT_PASSWORD_SERVICE = "mail-sender"

/**
 * Mailbox passwords keyed by account under one service name.
 */
export interface PasswordStore {
  readonly service: string
  getPassword(account: string): Promise<string | null>
  setPassword(account: string, password: string): Promise<void>
}

export type PasswordStoreOptions = {
  service?: string
}

export function passwordKey(service: string, account: string): SecretKey {
  return `${service}/${account}`
}

export function createPasswordStore(
  vault: SecretVault,
  options: PasswordStoreOptions = {},
): PasswordStore {
  const service = options.service ?? DEFAULT_PASSWORD_SERVICE

  return {
    service,

    async getPassword(account) {
      const secret = await vault.get(passwordKey(service, account))

      return secret?.value ?? null
    },

    async setPassword(account, password) {
      await vault.set(passwordKey(service, account), password)
    },
  }
}
