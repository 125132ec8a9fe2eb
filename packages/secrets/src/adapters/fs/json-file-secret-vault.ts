import { chmod, mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import type { Clock } from "@postline/clock"
import type { SecretKey, SecretValue, SecretVault } from "../../ports/secret-vault"

export type JsonFileSecretVaultDeps = {
  clock: Clock
}

export interface JsonFileSecretVaultOptions {
  /**
   * Path to the secrets file. Parent directories are created on first write.
   */
  path: string
}

interface JsonSecretEntry {
  value: string
  updatedAt: string
}

type JsonSecretsFile = Record<SecretKey, JsonSecretEntry>

const FILE_MODE = 0o600

/**
 * JSON file-backed secret vault, the local stand-in for an OS keyring.
 *
 * The file is rewritten whole on every change and kept readable by its
 * owner only.
 */
export class JsonFileSecretVault implements SecretVault {
  private readonly path: string

  constructor(
    private readonly deps: JsonFileSecretVaultDeps,
    options: JsonFileSecretVaultOptions,
  ) {
    this.path = options.path
  }

  async get(key: SecretKey): Promise<SecretValue | null> {
    const secrets = await this.load()
    const entry = secrets[key]

    if (!entry) return null

    return { value: entry.value, updatedAt: new Date(entry.updatedAt) }
  }

  async exists(key: SecretKey): Promise<boolean> {
    const secrets = await this.load()

    return key in secrets
  }

  async set(key: SecretKey, value: string): Promise<void> {
    if (value.length === 0) {
      throw new Error(`Secret value must not be empty: ${key}`)
    }

    const secrets = await this.load()
    secrets[key] = { value, updatedAt: this.deps.clock.now().toISOString() }

    await this.save(secrets)
  }

  async delete(key: SecretKey): Promise<void> {
    const secrets = await this.load()
    if (!(key in secrets)) return

    delete secrets[key]
    await this.save(secrets)
  }

  private async load(): Promise<JsonSecretsFile> {
    let content: string

    try {
      content = await readFile(this.path, "utf-8")
    } catch (err) {
      if (isMissingFile(err)) return {}
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (!isSecretsFile(parsed)) {
      throw new Error(`Secrets file is malformed: ${this.path}`)
    }

    return parsed
  }

  private async save(secrets: JsonSecretsFile): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    await writeFile(this.path, `${JSON.stringify(secrets, null, 2)}\n`, {
      encoding: "utf-8",
      mode: FILE_MODE,
    })
    // mode on writeFile only applies when the file is created
    await chmod(this.path, FILE_MODE)
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

function isSecretsFile(value: unknown): value is JsonSecretsFile {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  return Object.values(value).every(
    (entry: unknown) =>
      typeof entry === "object" &&
      entry !== null &&
      "value" in entry &&
      typeof entry.value === "string" &&
      "updatedAt" in entry &&
      typeof entry.updatedAt === "string",
  )
}
