import { type ConfigSource, selectPrefixed } from "../../ports/source"

export type EnvSourceOptions = {
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    return selectPrefixed(this.env, this.prefix)
  }
}
