import type { PasswordStore } from "@postline/secrets"

/** Store a mailbox password so later logins need no prompt. */
export async function registerPassword(
  store: PasswordStore,
  user: string,
  password: string,
): Promise<void> {
  await store.setPassword(user, password)
}
