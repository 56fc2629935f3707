import { describe, expect, it } from "vitest"
import { Effect, LogLevel, Logger, Redacted } from "effect"
import { layeredProvider } from "./config.js"
import { credentialEnv, maskCredentials, resolveCredentials, type CredentialSet } from "./credentials.js"
import { MissingCredential } from "./errors.js"
import { SigningIdentities } from "./services/SigningIdentities.js"

const IDENTITY = "Developer ID Application: Test Org (TEAM000001)"

const fullEnv = {
  APPLE_SIGNING_IDENTITY: IDENTITY,
  APPLE_ID: "dev@example.com",
  APPLE_PASSWORD: "test-secret",
  APPLE_TEAM_ID: "TEAM000001",
}

const resolve = (
  env: Record<string, string | undefined>,
  options: { readonly file?: ReadonlyMap<string, string>; readonly installed?: ReadonlyArray<string> } = {}
) =>
  resolveCredentials.pipe(
    Effect.withConfigProvider(layeredProvider(env, options.file ?? new Map())),
    Effect.provideService(
      SigningIdentities,
      SigningIdentities.of({ find: () => Effect.succeed(options.installed ?? []) })
    ),
    Logger.withMinimumLogLevel(LogLevel.None)
  )

describe("resolveCredentials", () => {
  it("reads all four credentials from the environment", async () => {
    const credentials = await Effect.runPromise(resolve(fullEnv))

    expect(credentials.signingIdentity).toBe(IDENTITY)
    expect(credentials.accountId).toBe("dev@example.com")
    expect(Redacted.value(credentials.accountSecret)).toBe("test-secret")
    expect(credentials.organizationId).toBe("TEAM000001")
  })

  it("keeps environment values over the env file", async () => {
    const file = new Map([
      ["APPLE_ID", "file@example.com"],
      ["APPLE_TEAM_ID", "TEAM000002"],
    ])
    const credentials = await Effect.runPromise(resolve(fullEnv, { file }))

    expect(credentials.accountId).toBe("dev@example.com")
    expect(credentials.organizationId).toBe("TEAM000001")
  })

  it("fills unset and empty environment values from the env file", async () => {
    const file = new Map([
      ["APPLE_ID", "file@example.com"],
      ["APPLE_PASSWORD", "file-secret"],
    ])
    const credentials = await Effect.runPromise(
      resolve({ ...fullEnv, APPLE_ID: "", APPLE_PASSWORD: undefined }, { file })
    )

    expect(credentials.accountId).toBe("file@example.com")
    expect(Redacted.value(credentials.accountSecret)).toBe("file-secret")
  })

  it("discovers the signing identity when none is supplied", async () => {
    const credentials = await Effect.runPromise(
      resolve(
        { ...fullEnv, APPLE_SIGNING_IDENTITY: undefined },
        { installed: [IDENTITY, "Developer ID Application: Other (TEAM000003)"] }
      )
    )

    expect(credentials.signingIdentity).toBe(IDENTITY)
  })

  it("lists every missing field", async () => {
    const error = await Effect.runPromise(Effect.flip(resolve({ APPLE_ID: "dev@example.com" })))

    expect(error).toBeInstanceOf(MissingCredential)
    if (error instanceof MissingCredential) {
      expect(error.missing).toEqual(["APPLE_SIGNING_IDENTITY", "APPLE_TEAM_ID", "APPLE_PASSWORD"])
      expect(error.message).toContain("  - APPLE_TEAM_ID")
    }
  })

  it("treats whitespace-only values as missing", async () => {
    const error = await Effect.runPromise(Effect.flip(resolve({ ...fullEnv, APPLE_TEAM_ID: "   " })))

    expect(error).toMatchObject({ _tag: "MissingCredential", missing: ["APPLE_TEAM_ID"] })
  })
})

describe("maskCredentials", () => {
  const credentials: CredentialSet = {
    signingIdentity: "x".repeat(60),
    accountId: "dev@example.com",
    accountSecret: Redacted.make("test-secret"),
    organizationId: "TEAM000001",
  }

  it("truncates the identity and hides everything else", () => {
    expect(maskCredentials(credentials)).toEqual([
      `✓ APPLE_SIGNING_IDENTITY: ${"x".repeat(50)}...`,
      "✓ APPLE_TEAM_ID: [set]",
      "✓ APPLE_ID: [set]",
      "✓ APPLE_PASSWORD: [set]",
    ])
  })

  it("never prints the secret through String()", () => {
    expect(String(credentials.accountSecret)).not.toBe("test-secret")
  })

  it("hands the raw values to the builder environment", () => {
    expect(credentialEnv(credentials)).toEqual({
      APPLE_SIGNING_IDENTITY: "x".repeat(60),
      APPLE_ID: "dev@example.com",
      APPLE_PASSWORD: "test-secret",
      APPLE_TEAM_ID: "TEAM000001",
    })
  })
})
