/**
 * Final verification and publication
 */
import { Effect, Either, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { Gatekeeper } from "./services/Gatekeeper.js"
import { NotarizationUnverified, PublishFailed, SignatureInvalid, degradeToWarning } from "./errors.js"

export interface PublishResult {
  readonly sourcePath: string
  readonly destinationPath: string
  readonly sizeBytes: number
}

export const formatSize = (bytes: number) => `${(bytes / 1024 / 1024).toFixed(2)} MB`

export const verificationCommands = (path: string) => [
  `codesign -dv --verbose=4 "${path}"`,
  `spctl -a -t open --context context:primary-signature "${path}"`,
]

/**
 * Signature is mandatory. Notarization failing here only warns, since the
 * verdict may not have propagated to this machine yet.
 */
export const verifyArtifact = (path: string) =>
  Effect.gen(function* () {
    const gatekeeper = yield* Gatekeeper

    if (!(yield* gatekeeper.verifySignature(path))) {
      return yield* new SignatureInvalid({
        path,
        message: `Code signature invalid for ${path}. Inspect with: codesign -dv --verbose=4 "${path}"`,
      })
    }
    yield* Effect.log("✓ Code signature valid")

    const notarization = yield* degradeToWarning(
      Effect.gen(function* () {
        if (!(yield* gatekeeper.assess(path))) {
          return yield* new NotarizationUnverified({
            path,
            message: "Gatekeeper check failed - artifact may not be notarized; users may see a warning when opening it",
          })
        }
        yield* Effect.log("✓ Notarization verified (Gatekeeper approved)")
      })
    )

    return Either.isLeft(notarization) ? [notarization.left] : []
  })

/**
 * Copies the artifact into `publishDir` under its own file name. The source
 * is never modified.
 */
export const publishArtifact = (sourcePath: string, publishDir: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const destinationPath = path.join(publishDir, path.basename(sourcePath))
    const failed = (error: { readonly message: string }) =>
      new PublishFailed({
        source: sourcePath,
        destination: destinationPath,
        message: `Could not publish ${sourcePath} to ${destinationPath}: ${error.message}`,
      })

    const info = yield* pipe(
      fs.makeDirectory(publishDir, { recursive: true }),
      Effect.zipRight(fs.copyFile(sourcePath, destinationPath)),
      Effect.zipRight(fs.stat(destinationPath)),
      Effect.mapError(failed)
    )

    const result: PublishResult = {
      sourcePath,
      destinationPath,
      sizeBytes: Number(info.size),
    }
    yield* Effect.log(`✓ Published ${destinationPath} (${formatSize(result.sizeBytes)})`)
    return result
  })

export const verifyAndPublish = (artifactPath: string, publishDir: string) =>
  Effect.gen(function* () {
    yield* Effect.log("🔍 Verifying artifact...")
    const warnings = yield* verifyArtifact(artifactPath)

    yield* Effect.log("📤 Publishing...")
    const result = yield* publishArtifact(artifactPath, publishDir)

    return { result, warnings }
  })
