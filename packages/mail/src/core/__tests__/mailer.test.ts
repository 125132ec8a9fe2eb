import { FakeClock } from "@postline/clock"
import { createNullLogger } from "@postline/logger"
import { createPasswordStore, MemorySecretVault } from "@postline/secrets"
import { NodeHtmlParserDetector } from "../../adapters/html/node-html-parser-detector"
import { isDelivered } from "../../ports/delivery"
import { FakeHttpFetcher } from "../../tests/utils/fake-http-fetcher"
import { FakeSmtpConnector } from "../../tests/utils/fake-smtp-connector"
import {
  ConnectionClosedError,
  InvalidAddressError,
  TransientDisconnectError,
} from "../errors/mail-error"
import { Mailer, type MailerDeps } from "../mailer"

const decode = (raw: Uint8Array) => new TextDecoder().decode(raw)

describe("Mailer", () => {
  let connector: FakeSmtpConnector
  let fetcher: FakeHttpFetcher
  let mailer: Mailer

  beforeEach(async () => {
    const clock = new FakeClock()
    connector = new FakeSmtpConnector()
    fetcher = new FakeHttpFetcher()

    const deps: MailerDeps = {
      connector,
      passwords: createPasswordStore(new MemorySecretVault({ clock })),
      clock,
      logger: createNullLogger(),
      fetcher,
      htmlDetector: new NodeHtmlParserDetector(),
    }

    mailer = await Mailer.login(deps, {
      user: { "me@example.com": "Me" },
      password: "test-secret",
      backoffUnitMs: 1,
    })
  })

  it("resolves, builds and transmits a message", async () => {
    const result = await mailer.send({
      to: "a@example.com",
      subject: ["Quarterly", "report"],
      contents: ["See attached."],
    })

    expect(isDelivered(result)).toBe(true)
    expect(result).toMatchObject({ status: "sent", recipients: ["a@example.com"] })

    const [transmission] = connector.transmissions
    expect(transmission?.envelope).toEqual({ from: "me@example.com", to: ["a@example.com"] })

    const raw = decode(transmission?.raw ?? new Uint8Array())
    expect(raw).toMatch(/^From: Me <me@example\.com>$/m)
    expect(raw).toMatch(/^To: a@example\.com$/m)
    expect(raw).toMatch(/^Subject: Quarterly report$/m)
    expect(raw).toContain("See attached.")
  })

  it("skips when no valid recipient remains", async () => {
    const result = await mailer.send({ to: "not-an-address", contents: "hi" })

    expect(result).toEqual({ status: "skipped", recipients: [] })
    expect(isDelivered(result)).toBe(false)
    expect(connector.transmissions).toEqual([])
  })

  it("throws on invalid addresses in strict mode", async () => {
    await expect(mailer.send({ to: "not-an-address", strict: true })).rejects.toThrow(
      InvalidAddressError,
    )
  })

  it("returns a preview without transmitting", async () => {
    const result = await mailer.send({ to: "a@example.com", contents: "hi", previewOnly: true })

    expect(result.status).toBe("preview")
    if (result.status !== "preview") return

    expect(result.addresses.recipients).toEqual(["a@example.com"])
    expect(decode(result.raw)).toMatch(/^To: a@example\.com$/m)
    expect(connector.events.filter((e) => e.startsWith("transmit"))).toEqual([])
  })

  it("mails the session user when only cc and bcc are given", async () => {
    const result = await mailer.send({
      cc: "c@example.com",
      bcc: "d@example.com",
      contents: "hi",
      previewOnly: true,
    })

    if (result.status !== "preview") throw new Error(`unexpected ${result.status}`)

    expect(result.addresses.recipients).toEqual(["me@example.com", "c@example.com", "d@example.com"])

    const raw = decode(result.raw)
    expect(raw).toMatch(/^To: Me <me@example\.com>$/m)
    expect(raw).toMatch(/^Cc: c@example\.com$/m)
    expect(raw).not.toMatch(/^Bcc:/im)
  })

  it("refuses to send after close", async () => {
    await mailer.close()

    await expect(mailer.send({ to: "a@example.com", contents: "hi" })).rejects.toThrow(
      ConnectionClosedError,
    )
  })

  it("resends messages queued after repeated disconnects", async () => {
    connector.failTransmit(
      ...[1, 2, 3].map(
        () => new TransientDisconnectError("Connection closed", { context: { phase: "send" } }),
      ),
    )

    const first = await mailer.send({ to: "a@example.com", contents: "hi" })
    expect(first).toMatchObject({ status: "queued", attempts: 3 })

    const resent = await mailer.resendUnsent()

    expect(resent).toMatchObject([{ status: "sent", recipients: ["a@example.com"], attempts: 1 }])
    expect(mailer.session.unsentCount).toBe(0)
  })

  it("sends fresh remote content after clearing the cache", async () => {
    const url = "https://files.example.com/notes.txt"
    fetcher.serve(url, "version one", "text/plain")
    await mailer.send({ to: "a@example.com", contents: url, useCache: true })

    fetcher.serve(url, "version two", "text/plain")
    mailer.clearCache()
    await mailer.send({ to: "a@example.com", contents: url, useCache: true })

    expect(fetcher.requests).toEqual([url, url])
  })
})
