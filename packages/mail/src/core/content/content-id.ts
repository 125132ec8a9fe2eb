import { createHash } from "node:crypto"

/**
 * Content-ID for an embedded image: the explicit name when given, else a
 * stable hash of the source basename.
 */
export function contentIdFor(basename: string, explicitName?: string): string {
  if (explicitName) return explicitName

  return createHash("sha256").update(basename).digest("hex").slice(0, 16)
}
