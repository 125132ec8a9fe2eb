import { FakeClock } from "@postline/clock"
import { MemorySecretVault } from "../../adapters/memory/memory-secret-vault"
import { createPasswordStore, passwordKey } from "../password-store"

describe("createPasswordStore", () => {
  let vault: MemorySecretVault

  beforeEach(() => {
    vault = new MemorySecretVault({ clock: new FakeClock() })
  })

  it("defaults the service name", () => {
    expect(createPasswordStore(vault).service).toBe("mail-sender")
  })

  it("stores passwords under service/account", async () => {
    const store = createPasswordStore(vault)

    await store.setPassword("ada@example.com", "test-secret")

    expect(passwordKey("mail-sender", "ada@example.com")).toBe("mail-sender/ada@example.com")
    expect((await vault.get("mail-sender/ada@example.com"))?.value).toBe("test-secret")
    expect(await store.getPassword("ada@example.com")).toBe("test-secret")
  })

  it("returns null for unknown accounts", async () => {
    expect(await createPasswordStore(vault).getPassword("ghost@example.com")).toBeNull()
  })

  it("isolates services sharing a vault", async () => {
    const work = createPasswordStore(vault, { service: "work" })
    const home = createPasswordStore(vault, { service: "home" })

    await work.setPassword("ada@example.com", "work-secret")

    expect(await home.getPassword("ada@example.com")).toBeNull()
    expect(await work.getPassword("ada@example.com")).toBe("work-secret")
  })
})
