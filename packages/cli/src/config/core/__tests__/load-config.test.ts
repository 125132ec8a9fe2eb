import { z } from "zod"
import type { ConfigSource } from "../../ports/source"
import { ConfigValidationError, loadConfig } from "../load-config"

function source(name: string, values: Record<string, string | undefined>): ConfigSource {
  return { name, load: async () => values }
}

const schema = z.object({
  HOST: z.string().default("localhost"),
  PORT: z.coerce.number().int().default(25),
})

describe("loadConfig", () => {
  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig(schema, [
      source("dotenv:.env", { HOST: "file.example.com", PORT: "2525" }),
      source("env", { HOST: "env.example.com" }),
    ])

    expect(config.value).toEqual({ HOST: "env.example.com", PORT: 2525 })
    expect(config.explain("HOST")).toBe("env")
    expect(config.explain("PORT")).toBe("dotenv:.env")
  })

  it("never overrides with undefined", async () => {
    const config = await loadConfig(schema, [
      source("dotenv:.env", { HOST: "file.example.com" }),
      source("env", { HOST: undefined }),
    ])

    expect(config.value.HOST).toBe("file.example.com")
  })

  it("reports schema defaults as such", async () => {
    const config = await loadConfig(schema, [source("env", {})])

    expect(config.value).toEqual({ HOST: "localhost", PORT: 25 })
    expect(config.explain("PORT")).toBe("default")
    expect(config.sourcesUsed()).toEqual([])
  })

  it("lists contributing sources once each", async () => {
    const config = await loadConfig(schema, [
      source("dotenv:.env", { HOST: "a", PORT: "1" }),
      source("env", { PORT: "2" }),
    ])

    expect(config.sourcesUsed()).toEqual(["dotenv:.env", "env"])
  })

  it("freezes the validated value", async () => {
    const config = await loadConfig(schema, [source("env", {})])

    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("throws ConfigValidationError with readable issues", async () => {
    const result = loadConfig(schema, [source("env", { PORT: "many" })])

    await expect(result).rejects.toThrow(ConfigValidationError)
    await expect(result).rejects.toThrow(/^Configuration validation failed:\n/)
  })
})
