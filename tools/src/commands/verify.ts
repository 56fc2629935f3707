/**
 * Verify command - signature and Gatekeeper checks without publishing
 */
import { Args, Command } from "@effect/cli"
import { Effect } from "effect"
import { verificationCommands, verifyArtifact } from "../publish.js"

const artifactArg = Args.file({ name: "artifact", exists: "yes" }).pipe(
  Args.withDescription("Artifact to verify")
)

export const verifyCommand = Command.make("verify", { artifact: artifactArg }, ({ artifact }) =>
  Effect.gen(function* () {
    const warnings = yield* verifyArtifact(artifact)

    if (warnings.length === 0) {
      yield* Effect.log(`✅ ${artifact} is signed and notarized`)
      return
    }

    yield* Effect.log("Details:")
    for (const command of verificationCommands(artifact)) {
      yield* Effect.log(`  ${command}`)
    }
  })
).pipe(Command.withDescription("Check the code signature and notarization of an artifact"))
