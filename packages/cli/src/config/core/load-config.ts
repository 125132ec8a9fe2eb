import { type ZodType, z } from "zod"
import type { ConfigSource } from "../ports/source"

export type LoadedConfig<T> = {
  readonly value: Readonly<T>

  /** Name of the source that supplied `key`, or "default". */
  explain(key: string): string

  sourcesUsed(): string[]
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string) {
    super(`Configuration validation failed:\n${issues}`)
    this.name = "ConfigValidationError"
  }
}

/**
 * Merge sources in order (later wins, `undefined` never overrides) and
 * validate the result against `schema`.
 */
export async function loadConfig<T>(
  schema: ZodType<T>,
  sources: readonly ConfigSource[],
): Promise<LoadedConfig<T>> {
  const merged: Record<string, string> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error))
  }

  const value = Object.freeze(result.data)

  return {
    value,
    explain: (key) => provenance.get(key) ?? "default",
    sourcesUsed: () => [...new Set(provenance.values())],
  }
}
