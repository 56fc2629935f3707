import { describe, expect, it } from "vitest"
import { Effect, LogLevel, Logger } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { SignatureInvalid } from "./errors.js"
import { formatSize, verifyAndPublish } from "./publish.js"
import { Gatekeeper } from "./services/Gatekeeper.js"

const CONTENT = "test disk image bytes"

const withArtifact = (checks: { readonly signed: boolean; readonly accepted: boolean }) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const root = yield* fs.makeTempDirectoryScoped()
    const source = path.join(root, "App_1.0.0_aarch64.dmg")
    const publishDir = path.join(root, "public", "downloads")
    yield* fs.writeFileString(source, CONTENT)

    const outcome = yield* verifyAndPublish(source, publishDir).pipe(
      Effect.provideService(
        Gatekeeper,
        Gatekeeper.of({
          assess: () => Effect.succeed(checks.accepted),
          verifySignature: () => Effect.succeed(checks.signed),
        })
      ),
      Effect.either
    )

    return {
      outcome,
      source,
      publishDir,
      published: yield* fs.exists(path.join(publishDir, "App_1.0.0_aarch64.dmg")),
      sourceAfter: yield* fs.readFileString(source),
    }
  }).pipe(
    Effect.scoped,
    Effect.provide(NodeContext.layer),
    Logger.withMinimumLogLevel(LogLevel.None),
    Effect.runPromise
  )

describe("verifyAndPublish", () => {
  it("copies a verified artifact under its own name", async () => {
    const result = await withArtifact({ signed: true, accepted: true })

    expect(result.outcome._tag).toBe("Right")
    if (result.outcome._tag === "Right") {
      expect(result.outcome.right.warnings).toEqual([])
      expect(result.outcome.right.result).toEqual({
        sourcePath: result.source,
        destinationPath: `${result.publishDir}/App_1.0.0_aarch64.dmg`,
        sizeBytes: CONTENT.length,
      })
    }
    expect(result.published).toBe(true)
    expect(result.sourceAfter).toBe(CONTENT)
  })

  it("publishes with a warning when Gatekeeper does not accept it yet", async () => {
    const result = await withArtifact({ signed: true, accepted: false })

    expect(result.outcome._tag).toBe("Right")
    if (result.outcome._tag === "Right") {
      expect(result.outcome.right.warnings.map(warning => warning._tag)).toEqual(["NotarizationUnverified"])
    }
    expect(result.published).toBe(true)
  })

  it("refuses to publish an artifact with an invalid signature", async () => {
    const result = await withArtifact({ signed: false, accepted: true })

    expect(result.outcome._tag).toBe("Left")
    if (result.outcome._tag === "Left") {
      expect(result.outcome.left).toBeInstanceOf(SignatureInvalid)
    }
    expect(result.published).toBe(false)
  })
})

describe("formatSize", () => {
  it("prints megabytes with two decimals", () => {
    expect(formatSize(1_572_864)).toBe("1.50 MB")
  })
})
