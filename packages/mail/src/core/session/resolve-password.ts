import type { Logger } from "@postline/logger"
import type { PasswordStore } from "@postline/secrets"
import { AuthError } from "../errors/mail-error"
import type { CredentialPrompt } from "../../ports/credential-prompt"
import type { SmtpCredentials } from "../../ports/smtp"

export const DEFAULT_MAIL_DOMAIN = "gmail.com"

export type ResolvePasswordDeps = {
  passwords: PasswordStore
  prompt?: CredentialPrompt
  logger: Logger
}

export type ResolvePasswordRequest = {
  identity: string
  password?: string
  defaultDomain?: string
}

/**
 * Find the password for a mailbox: the explicit argument, then the secret
 * store under the identity as given, then (for identities without `@`)
 * under `identity@<defaultDomain>`, then an interactive prompt that offers
 * to save what was typed.
 *
 * Without an explicit password, an identity lacking `@` is returned with
 * the default domain appended.
 */
export async function resolvePassword(
  deps: ResolvePasswordDeps,
  request: ResolvePasswordRequest,
): Promise<SmtpCredentials> {
  const { identity, password } = request

  if (password !== undefined) return { user: identity, password }

  const { passwords, prompt, logger } = deps
  const user = identity.includes("@")
    ? identity
    : `${identity}@${request.defaultDomain ?? DEFAULT_MAIL_DOMAIN}`

  const stored =
    (await passwords.getPassword(identity)) ??
    (user !== identity ? await passwords.getPassword(user) : null)

  if (stored !== null) {
    logger.debug("Using stored password", { user, service: passwords.service })
    return { user, password: stored }
  }

  if (!prompt) {
    throw new AuthError(`No password available for <${user}>`, { context: { user } })
  }

  const typed = await prompt.password(`Password for <${user}>:`)

  if (await prompt.confirm("Save username and password in the secret store?")) {
    await passwords.setPassword(user, typed)
    logger.info("Saved password to the secret store", { user, service: passwords.service })
  }

  return { user, password: typed }
}
