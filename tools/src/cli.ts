#!/usr/bin/env node
/**
 * release-pilot CLI - build, notarize, and publish macOS releases
 */
import { Command, ValidationError } from "@effect/cli"
import { NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { credentialsCommand } from "./commands/credentials.js"
import { notarizeCommand } from "./commands/notarize.js"
import { releaseCommand } from "./commands/release.js"
import { verifyCommand } from "./commands/verify.js"
import { MainLive } from "./layers/index.js"

// Root command with subcommands
const rootCommand = Command.make("release-pilot", {}, () =>
  Effect.gen(function* () {
    yield* Effect.log("Use a subcommand: release, notarize, verify, or credentials")
    yield* Effect.log("Run 'release-pilot --help' for more information")
  })
).pipe(
  Command.withSubcommands([releaseCommand, notarizeCommand, verifyCommand, credentialsCommand]),
  Command.withDescription("macOS build, notarization, and publishing pipeline")
)

// CLI application
const cli = Command.run(rootCommand, {
  name: "release-pilot",
  version: "0.1.0",
})

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error))

// Any failure exits 1 through the runtime teardown
NodeRuntime.runMain(
  cli(process.argv).pipe(
    // The CLI prints its own usage errors
    Effect.tapError(error =>
      ValidationError.isValidationError(error) ? Effect.void : Effect.logError(`✗ ${describeError(error)}`)
    ),
    Effect.provide(MainLive)
  ),
  { disableErrorReporting: true }
)
