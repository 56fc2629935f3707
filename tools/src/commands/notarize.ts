/**
 * Notarize command - submit and staple an existing artifact
 */
import { Args, Command } from "@effect/cli"
import { Effect, Either } from "effect"
import * as AppConfig from "../config.js"
import { withEnvFile } from "../config.js"
import { resolveCredentials } from "../credentials.js"
import { notarizeArtifact } from "../notarize.js"
import { envFileOption } from "./options.js"

const artifactArg = Args.file({ name: "artifact", exists: "yes" }).pipe(
  Args.withDescription("DMG to notarize")
)

export const notarizeCommand = Command.make(
  "notarize",
  { envFile: envFileOption, artifact: artifactArg },
  ({ envFile, artifact }) =>
    Effect.gen(function* () {
      const credentials = yield* resolveCredentials
      const staple = {
        grace: yield* AppConfig.stapleGrace,
        attempts: yield* AppConfig.stapleAttempts,
        backoff: yield* AppConfig.stapleBackoff,
      }

      const outcome = yield* notarizeArtifact(artifact, credentials, staple)
      if (outcome._tag === "Submitted" && Either.isRight(outcome.staple)) {
        yield* Effect.log(`✅ ${artifact} notarized and stapled`)
      }
    }).pipe(withEnvFile(envFile))
).pipe(Command.withDescription("Submit an artifact for notarization and staple the ticket"))
