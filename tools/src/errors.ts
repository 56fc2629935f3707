/**
 * Release pipeline errors
 *
 * Fatal errors abort the run. StapleExhausted and NotarizationUnverified are
 * degradable: the artifact still passes online verification without them.
 */
import { Data, Effect, Either } from "effect"

export class MissingCredential extends Data.TaggedError("MissingCredential")<{
  readonly message: string
  readonly missing: ReadonlyArray<string>
}> {
  static of(missing: ReadonlyArray<string>) {
    return new MissingCredential({
      missing,
      message: [
        "Missing required environment variables:",
        ...missing.map(key => `  - ${key}`),
        "Add these to the env file or export them before running.",
        "To find your signing identity: security find-identity -v -p codesigning",
      ].join("\n"),
    })
  }
}

export class BuildLaunchFailed extends Data.TaggedError("BuildLaunchFailed")<{
  readonly message: string
  readonly command: string
}> {}

export type OutputKind = "bundle" | "artifact"

export class BuildArtifactMissing extends Data.TaggedError("BuildArtifactMissing")<{
  readonly message: string
  readonly kind: OutputKind
  readonly path: string
  readonly reason: "not-found" | "not-a-bundle" | "stale"
}> {}

export class NotarizationRejected extends Data.TaggedError("NotarizationRejected")<{
  readonly message: string
  readonly path: string
  readonly exitCode: number
  readonly output: string
}> {}

export class StapleExhausted extends Data.TaggedError("StapleExhausted")<{
  readonly message: string
  readonly path: string
  readonly attempts: number
}> {}

export class SignatureInvalid extends Data.TaggedError("SignatureInvalid")<{
  readonly message: string
  readonly path: string
}> {}

export class NotarizationUnverified extends Data.TaggedError("NotarizationUnverified")<{
  readonly message: string
  readonly path: string
}> {}

export class PublishFailed extends Data.TaggedError("PublishFailed")<{
  readonly message: string
  readonly source: string
  readonly destination: string
}> {}

export class ToolFailed extends Data.TaggedError("ToolFailed")<{
  readonly message: string
  readonly tool: string
  readonly exitCode: number
}> {}

export type Degradable = StapleExhausted | NotarizationUnverified

export type FatalError =
  | MissingCredential
  | BuildLaunchFailed
  | BuildArtifactMissing
  | NotarizationRejected
  | SignatureInvalid
  | PublishFailed
  | ToolFailed

/**
 * Turns a degradable failure into a logged warning. The failure is kept on the
 * Left so callers can put it on the release report.
 */
export const degradeToWarning = <A, E extends Degradable, R>(
  self: Effect.Effect<A, E, R>
): Effect.Effect<Either.Either<A, E>, never, R> =>
  self.pipe(
    Effect.either,
    Effect.tap(result =>
      Either.isLeft(result)
        ? Effect.logWarning(`⚠ ${result.left.message}`)
        : Effect.void
    )
  )
