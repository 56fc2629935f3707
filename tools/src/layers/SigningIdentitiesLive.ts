/**
 * Live implementation of SigningIdentities service
 */
import { Effect, Layer, pipe } from "effect"
import { Command } from "@effect/platform"
import { SigningIdentities } from "../services/SigningIdentities.js"
import { makeRunner } from "./command.js"

/**
 * Pulls the quoted identity names out of `security find-identity` output.
 */
export const parseIdentities = (output: string, identityClass: string) =>
  output
    .split("\n")
    .map(line => line.match(/"([^"]+)"/)?.[1])
    .filter((name): name is string => name !== undefined && name.includes(identityClass))

export const SigningIdentitiesLive = Layer.effect(
  SigningIdentities,
  Effect.gen(function* () {
    const runner = yield* makeRunner

    const find = (identityClass: string) =>
      pipe(
        runner.capture(Command.make("security", "find-identity", "-v", "-p", "codesigning")),
        Effect.map(({ exitCode, stdout }) =>
          exitCode === 0 ? parseIdentities(stdout, identityClass) : []
        ),
        Effect.catchAll(error =>
          pipe(
            Effect.logDebug(`security find-identity failed: ${error.message}`),
            Effect.as([])
          )
        )
      )

    return SigningIdentities.of({ find })
  })
)
