import { describe, expect, it } from "vitest"
import { ConfigError, ConfigProvider, Effect, Either } from "effect"
import * as AppConfig from "./config.js"

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  AppConfig.appConfig.pipe(
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))),
    Effect.either,
    Effect.runPromise
  )

describe("appConfig", () => {
  it("falls back to the defaults", async () => {
    const config = Either.getOrThrow(await load([]))

    expect(config.pollInterval).toBe(5)
    expect(config.buildDeadline).toBe(600)
    expect(config.stapleAttempts).toBe(6)
    expect(config.rejectStaleArtifacts).toBe(true)
  })

  it("rejects a poll interval that would never advance", async () => {
    const result = await load([["POLL_INTERVAL_SECONDS", "0"]])

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result) && ConfigError.isInvalidData(result.left)) {
      expect(result.left.message).toBe("POLL_INTERVAL_SECONDS must be at least 1")
    } else {
      expect.fail("expected invalid data")
    }
  })

  it("rejects a negative backoff", async () => {
    const result = await load([["STAPLE_BACKOFF_SECONDS", "-5"]])

    expect(Either.isLeft(result)).toBe(true)
  })

  it("allows a zero grace period", async () => {
    const config = Either.getOrThrow(await load([["STAPLE_GRACE_SECONDS", "0"]]))

    expect(config.stapleGrace).toBe(0)
  })
})
