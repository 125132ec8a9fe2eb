import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("t")
      logger.debug("d")
      logger.info("i", { host: "smtp.example.com" })
      logger.warn("w")
      logger.error("e", { err: new Error("boom") })
      logger.fatal("f")
    }).not.toThrow()
  })

  it("child() returns another NullLogger", () => {
    const child = new NullLogger().child({ module: "session" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
