/**
 * Live implementation of BuildSupervisor service
 */
import { Clock, Effect, Layer, pipe } from "effect"
import { Command } from "@effect/platform"
import { BuildSupervisor, TerminateOutcome, type BuildHandle } from "../services/BuildSupervisor.js"
import { credentialEnv, type CredentialSet } from "../credentials.js"
import { BuildLaunchFailed } from "../errors.js"
import * as AppConfig from "../config.js"
import { makeRunner } from "./command.js"

// Reported by join when the child could not be reaped
const UNKNOWN_EXIT = -1

export const BuildSupervisorLive = Layer.effect(
  BuildSupervisor,
  Effect.gen(function* () {
    const buildCommand = yield* AppConfig.buildCommand
    const { executor } = yield* makeRunner

    const launch = (credentials: CredentialSet) =>
      Effect.gen(function* () {
        const [name, ...args] = buildCommand.split(/\s+/).filter(part => part !== "")
        if (name === undefined) {
          return yield* new BuildLaunchFailed({
            command: buildCommand,
            message: "BUILD_COMMAND is empty",
          })
        }

        const command = pipe(
          Command.make(name, ...args),
          Command.env(credentialEnv(credentials)),
          Command.stdout("inherit"),
          Command.stderr("inherit")
        )

        const startedAt = yield* Clock.currentTimeMillis
        const child = yield* pipe(
          executor.start(command),
          Effect.mapError(
            error =>
              new BuildLaunchFailed({
                command: buildCommand,
                message: `Could not start ${buildCommand}: ${error.message}`,
              })
          )
        )
        yield* Effect.log(`Builder started (pid ${child.pid})`)

        const join = pipe(
          child.exitCode,
          Effect.map(exitCode => ({ exitCode })),
          Effect.catchAll(error =>
            pipe(
              Effect.logDebug(`Could not reap builder: ${error.message}`),
              Effect.as({ exitCode: UNKNOWN_EXIT })
            )
          )
        )

        const isAlive = pipe(
          child.isRunning,
          Effect.catchAll(error =>
            pipe(
              Effect.logDebug(`Liveness probe failed: ${error.message}`),
              Effect.as(false)
            )
          )
        )

        const terminate = Effect.gen(function* () {
          if (!(yield* isAlive)) {
            const { exitCode } = yield* join
            return TerminateOutcome.AlreadyExited({ exitCode })
          }

          return yield* pipe(
            child.kill("SIGTERM"),
            Effect.zipRight(join),
            Effect.map(({ exitCode }) => TerminateOutcome.Signalled({ exitCode })),
            Effect.catchAll(error =>
              Effect.succeed(TerminateOutcome.Failed({ reason: error.message }))
            )
          )
        })

        return {
          pid: child.pid,
          startedAt,
          isAlive,
          terminate,
          join,
        } satisfies BuildHandle
      })

    return BuildSupervisor.of({ launch })
  })
)
