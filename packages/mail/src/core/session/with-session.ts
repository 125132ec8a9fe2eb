import { type LoginOptions, SessionManager, type SessionManagerDeps } from "./session-manager"

/**
 * Log in, run `fn`, and close the session however `fn` ends.
 */
export async function withSession<T>(
  deps: SessionManagerDeps,
  options: LoginOptions,
  fn: (session: SessionManager) => Promise<T>,
): Promise<T> {
  const session = await SessionManager.login(deps, options)

  try {
    return await fn(session)
  } finally {
    await session.close()
  }
}
