/**
 * Application configuration using Effect Config
 *
 * Values come from the process environment first and the env file second, so
 * anything already exported is never overwritten by the file.
 */
import { Config, ConfigProvider, Effect } from "effect"
import { FileSystem } from "@effect/platform"
import { parse } from "dotenv"

export const CREDENTIAL_KEYS = {
  signingIdentity: "APPLE_SIGNING_IDENTITY",
  organizationId: "APPLE_TEAM_ID",
  accountId: "APPLE_ID",
  accountSecret: "APPLE_PASSWORD",
} as const

const credentialKeys: ReadonlyArray<string> = Object.values(CREDENTIAL_KEYS)

const atLeast = (name: string, fallback: number, minimum: 0 | 1) =>
  Config.integer(name).pipe(
    Config.validate({
      message: `${name} must be ${minimum === 0 ? "zero or more" : "at least 1"}`,
      validation: (value: number) => value >= minimum,
    }),
    Config.withDefault(fallback)
  )

// Define all config entries
export const productName = Config.string("PRODUCT_NAME").pipe(
  Config.withDefault("App")
)

export const productVersion = Config.string("PRODUCT_VERSION").pipe(
  Config.withDefault("1.0.0")
)

export const targetArch = Config.string("TARGET_ARCH").pipe(
  Config.withDefault("aarch64")
)

export const bundleRoot = Config.string("BUNDLE_ROOT").pipe(
  Config.withDefault("src-tauri/target/release/bundle")
)

export const buildCommand = Config.string("BUILD_COMMAND").pipe(
  Config.withDefault("npx @tauri-apps/cli build")
)

export const publishDir = Config.string("PUBLISH_DIR").pipe(
  Config.withDefault("../public/downloads")
)

export const pollInterval = atLeast("POLL_INTERVAL_SECONDS", 5, 1)

export const buildDeadline = atLeast("BUILD_DEADLINE_SECONDS", 600, 1)

export const heartbeat = atLeast("HEARTBEAT_SECONDS", 30, 0)

export const stapleGrace = atLeast("STAPLE_GRACE_SECONDS", 30, 0)

export const stapleAttempts = atLeast("STAPLE_ATTEMPTS", 6, 1)

export const stapleBackoff = atLeast("STAPLE_BACKOFF_SECONDS", 10, 0)

export const identityClass = Config.string("SIGNING_IDENTITY_CLASS").pipe(
  Config.withDefault("Developer ID Application")
)

export const createDiskImage = Config.boolean("CREATE_DISK_IMAGE").pipe(
  Config.withDefault(false)
)

export const rejectStaleArtifacts = Config.boolean("REJECT_STALE_ARTIFACTS").pipe(
  Config.withDefault(true)
)

// Composite config
export const appConfig = Config.all({
  productName,
  productVersion,
  targetArch,
  bundleRoot,
  buildCommand,
  publishDir,
  pollInterval,
  buildDeadline,
  heartbeat,
  stapleGrace,
  stapleAttempts,
  stapleBackoff,
  identityClass,
  createDiskImage,
  rejectStaleArtifacts,
})

export type AppConfig = Config.Config.Success<typeof appConfig>

/**
 * Reads the credential entries of an env file. A missing file yields no
 * entries; only the four credential keys are taken from it.
 */
export const readEnvFile = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    if (!(yield* fs.exists(path))) {
      yield* Effect.logDebug(`No env file at ${path}`)
      return new Map<string, string>()
    }

    yield* Effect.log(`Loading credentials from ${path}...`)
    const parsed = parse(yield* fs.readFileString(path))

    return new Map(
      Object.entries(parsed).filter(([key]) => credentialKeys.includes(key))
    )
  })

/**
 * Environment over env file. Empty environment values count as unset, so the
 * file can still supply them.
 */
export const layeredProvider = (
  env: Readonly<Record<string, string | undefined>>,
  fileEntries: ReadonlyMap<string, string>
) => {
  const fromEnv = new Map<string, string>()
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      fromEnv.set(key, value)
    }
  }

  return ConfigProvider.fromMap(fromEnv).pipe(
    ConfigProvider.orElse(() => ConfigProvider.fromMap(new Map(fileEntries)))
  )
}

/**
 * Runs `self` against the process environment layered over `envFile`.
 */
export const withEnvFile =
  (envFile: string) =>
  <A, E, R>(self: Effect.Effect<A, E, R>) =>
    Effect.gen(function* () {
      const fileEntries = yield* readEnvFile(envFile)
      return yield* Effect.withConfigProvider(
        self,
        layeredProvider(process.env, fileEntries)
      )
    })
