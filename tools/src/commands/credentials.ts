/**
 * Credentials command - show which credentials resolve, masked
 */
import { Command } from "@effect/cli"
import { Effect } from "effect"
import { maskCredentials, resolveCredentials } from "../credentials.js"
import { withEnvFile } from "../config.js"
import { envFileOption } from "./options.js"

export const credentialsCommand = Command.make("credentials", { envFile: envFileOption }, ({ envFile }) =>
  Effect.gen(function* () {
    const credentials = yield* resolveCredentials

    for (const line of maskCredentials(credentials)) {
      yield* Effect.log(line)
    }
  }).pipe(withEnvFile(envFile))
).pipe(Command.withDescription("Resolve credentials from the environment and env file"))
