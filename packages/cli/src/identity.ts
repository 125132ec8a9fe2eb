import { readFile } from "node:fs/promises"

/**
 * Read the default sending identity: the file's contents, trimmed.
 * A missing or blank file yields null.
 */
export async function readIdentityFile(path: string): Promise<string | null> {
  let content: string

  try {
    content = await readFile(path, "utf-8")
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null
    throw err
  }

  const identity = content.trim()
  return identity === "" ? null : identity
}
