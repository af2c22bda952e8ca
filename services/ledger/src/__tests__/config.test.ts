import { describe, it, expect } from "vitest"
import { ConfigProvider, Effect, Exit } from "effect"
import { LedgerConfig, LedgerConfigLive } from "../config.js"

const loadConfig = (env: Record<string, string>) =>
  LedgerConfig.pipe(
    Effect.provide(LedgerConfigLive),
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))))
  )

describe("LedgerConfig", () => {
  it("should fall back to defaults", async () => {
    const config = await Effect.runPromise(loadConfig({}))

    expect(config.port).toBe(3004)
    expect(config.defaultPageSize).toBe(10)
    expect(config.maxPageSize).toBe(100)
    expect(config.logLevel.label).toBe("INFO")
  })

  it("should read overrides from the environment", async () => {
    const config = await Effect.runPromise(
      loadConfig({ PORT: "8080", DEFAULT_PAGE_SIZE: "25", MAX_PAGE_SIZE: "50", LOG_LEVEL: "Debug" })
    )

    expect(config.port).toBe(8080)
    expect(config.defaultPageSize).toBe(25)
    expect(config.maxPageSize).toBe(50)
    expect(config.logLevel.label).toBe("DEBUG")
  })

  it("should cap the default page size at the maximum", async () => {
    const config = await Effect.runPromise(loadConfig({ DEFAULT_PAGE_SIZE: "500", MAX_PAGE_SIZE: "100" }))

    expect(config.defaultPageSize).toBe(100)
  })

  it("should fail on a non-numeric port", async () => {
    const exit = await Effect.runPromiseExit(loadConfig({ PORT: "not-a-port" }))

    expect(Exit.isFailure(exit)).toBe(true)
  })
})
