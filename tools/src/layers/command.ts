/**
 * Command execution helpers shared by the live layers
 */
import { Effect, Stream, pipe } from "effect"
import { Command, CommandExecutor } from "@effect/platform"

export interface CommandOutput {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export const describe = (command: Command.Command): string =>
  Command.flatten(command)
    .map(part => [part.command, ...part.args].join(" "))
    .join(" | ")

/**
 * Binds a runner to the executor captured when the layer is built, so service
 * methods do not leak CommandExecutor into their requirements.
 */
export const makeRunner = Effect.gen(function* () {
  const executor = yield* CommandExecutor.CommandExecutor

  const capture = (command: Command.Command) =>
    Effect.scoped(
      Effect.gen(function* () {
        const child = yield* executor.start(command)
        const [stdout, stderr, exitCode] = yield* Effect.all(
          [
            pipe(child.stdout, Stream.decodeText(), Stream.mkString),
            pipe(child.stderr, Stream.decodeText(), Stream.mkString),
            child.exitCode,
          ],
          { concurrency: "unbounded" }
        )
        return { exitCode, stdout, stderr } satisfies CommandOutput
      })
    )

  // Exit 0 means yes; any other code or a spawn failure means no
  const succeeds = (command: Command.Command) =>
    pipe(
      capture(command),
      Effect.map(({ exitCode }) => exitCode === 0),
      Effect.catchAll(error =>
        pipe(
          Effect.logDebug(`${describe(command)} could not run: ${error.message}`),
          Effect.as(false)
        )
      )
    )

  return { executor, capture, succeeds }
})
