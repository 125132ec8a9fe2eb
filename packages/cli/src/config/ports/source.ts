/**
 * Raw configuration values from one place (the environment, a `.env` file).
 *
 * Sources only load. Coercion and validation happen in the schema, and
 * later sources override earlier ones.
 */
export interface ConfigSource {
  /** Shown in provenance, e.g. "env" or "dotenv:.env". */
  readonly name: string

  load(): Promise<Record<string, string | undefined>>
}

/** Keep entries whose key starts with `prefix`, with the prefix removed. */
export function selectPrefixed(
  values: Record<string, string | undefined>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const selected: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) selected[key.slice(prefix.length)] = value
  }

  return selected
}
