import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  if (line === undefined) throw new Error("no log line captured")
  return JSON.parse(line) as Record<string, unknown>
}

describe("PinoLogger behavior", () => {
  it("emits JSON with bindings and meta to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { module: "session" },
    )

    logger.info("connected", { host: "smtp.example.com", port: 587 })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "connected",
      module: "session",
      host: "smtp.example.com",
      port: 587,
      level: 30,
    })
  })

  it("honors the minimum level", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.info("ignored")
    logger.warn("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0]).msg).toBe("kept")
  })

  it("child() inherits the sink, level and bindings", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "postline" })
    const child = base.child({ user: "alice@example.com" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      service: "postline",
      user: "alice@example.com",
    })
  })

  it("redacts credential fields", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.info("login", {
      user: "alice@example.com",
      password: "test-secret",
      credentials: { user: "alice@example.com", pass: "test-secret" },
    })

    const payload = parse(lines[0])

    expect(payload.password).toBe("[redacted]")
    expect(payload.credentials).toEqual({ user: "alice@example.com", pass: "[redacted]" })
  })

  it("serializes errors under err", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("send failed", { err: new Error("socket closed") })

    const payload = parse(lines[0])

    expect(payload.err).toMatchObject({ type: "Error", message: "socket closed" })
  })
})
