/**
 * Release pipeline - build, watch, notarize, verify, publish
 */
import { Effect, Either, Option } from "effect"
import { Path } from "@effect/platform"
import * as AppConfig from "./config.js"
import { maskCredentials, resolveCredentials } from "./credentials.js"
import type { Degradable } from "./errors.js"
import { notarizeArtifact, type NotarizeOutcome, type StapleSettings } from "./notarize.js"
import { pollBuild, validateOutputs, type OutputPaths, type PollOutcome, type PollSettings } from "./poller.js"
import { formatSize, verificationCommands, verifyAndPublish, type PublishResult } from "./publish.js"
import { BuildSupervisor } from "./services/BuildSupervisor.js"
import { DiskImage } from "./services/DiskImage.js"

export interface ReleaseSettings {
  readonly productName: string
  readonly paths: OutputPaths
  readonly poll: PollSettings
  readonly staple: StapleSettings
  readonly publishDir: string
  readonly buildCommand: string
  readonly createDiskImage: boolean
  readonly rejectStale: boolean
}

export interface ReleaseReport {
  readonly publish: PublishResult
  readonly poll: PollOutcome
  readonly notarization: Option.Option<NotarizeOutcome>
  readonly warnings: ReadonlyArray<Degradable>
}

export const outputPaths = (config: AppConfig.AppConfig) =>
  Effect.gen(function* () {
    const path = yield* Path.Path
    return {
      bundle: path.join(config.bundleRoot, "macos", `${config.productName}.app`),
      artifact: path.join(
        config.bundleRoot,
        "dmg",
        `${config.productName}_${config.productVersion}_${config.targetArch}.dmg`
      ),
    } satisfies OutputPaths
  })

/**
 * Release settings from config, with an optional publish directory and disk
 * image override from the command line.
 */
export const loadReleaseSettings = (overrides: {
  readonly publishDir: Option.Option<string>
  readonly createDiskImage: boolean
}) =>
  Effect.gen(function* () {
    const config = yield* AppConfig.appConfig
    const paths = yield* outputPaths(config)

    return {
      productName: config.productName,
      paths,
      poll: {
        interval: config.pollInterval,
        deadline: config.buildDeadline,
        heartbeat: config.heartbeat,
      },
      staple: {
        grace: config.stapleGrace,
        attempts: config.stapleAttempts,
        backoff: config.stapleBackoff,
      },
      publishDir: Option.getOrElse(overrides.publishDir, () => config.publishDir),
      buildCommand: config.buildCommand,
      createDiskImage: overrides.createDiskImage || config.createDiskImage,
      rejectStale: config.rejectStaleArtifacts,
    } satisfies ReleaseSettings
  })

export const runRelease = (settings: ReleaseSettings) =>
  Effect.scoped(
    Effect.gen(function* () {
      const supervisor = yield* BuildSupervisor
      const diskImage = yield* DiskImage
      const warnings: Array<Degradable> = []

      yield* Effect.log("Checking credentials...")
      const credentials = yield* resolveCredentials
      for (const line of maskCredentials(credentials)) {
        yield* Effect.log(`  ${line}`)
      }

      // Build
      yield* Effect.log("🔨 Building (this may take a few minutes)...")
      const handle = yield* supervisor.launch(credentials)
      const poll = yield* pollBuild(handle, settings.paths, settings.poll, {
        watchArtifact: !settings.createDiskImage,
        rejectStale: settings.rejectStale,
      })
      yield* validateOutputs(settings.paths, poll, handle.startedAt, {
        requireArtifact: !settings.createDiskImage,
        rejectStale: settings.rejectStale,
        buildCommand: settings.buildCommand,
      })

      if (settings.createDiskImage) {
        yield* Effect.log("💿 Creating disk image...")
        yield* diskImage.create(settings.paths.bundle, settings.paths.artifact, settings.productName)
        yield* diskImage.sign(settings.paths.artifact, credentials.signingIdentity)
      }

      // Notarize unless the builder already did. A created image is always new.
      let notarization = Option.none<NotarizeOutcome>()
      if (poll.artifacts.notarized && !settings.createDiskImage) {
        yield* Effect.log("✓ Artifact notarized by the builder")
      } else {
        yield* Effect.log("🍎 Notarizing...")
        const outcome = yield* notarizeArtifact(settings.paths.artifact, credentials, settings.staple)
        if (outcome._tag === "Submitted" && Either.isLeft(outcome.staple)) {
          warnings.push(outcome.staple.left)
        }
        notarization = Option.some(outcome)
      }

      const { result, warnings: verifyWarnings } = yield* verifyAndPublish(
        settings.paths.artifact,
        settings.publishDir
      )
      warnings.push(...verifyWarnings)

      return { publish: result, poll, notarization, warnings } satisfies ReleaseReport
    })
  )

export const reportLines = (report: ReleaseReport): ReadonlyArray<string> => [
  `Artifact: ${report.publish.destinationPath}`,
  `Size: ${formatSize(report.publish.sizeBytes)}`,
  ...(report.warnings.length > 0
    ? [`Warnings: ${report.warnings.map(warning => warning._tag).join(", ")}`]
    : []),
  "Verification commands:",
  ...verificationCommands(report.publish.sourcePath).map(command => `  ${command}`),
]
