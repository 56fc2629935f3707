/**
 * Notarization submission and ticket stapling
 */
import { Data, Duration, Effect, Either } from "effect"
import type { CredentialSet } from "./credentials.js"
import { StapleExhausted, degradeToWarning } from "./errors.js"
import { Gatekeeper } from "./services/Gatekeeper.js"
import { Notary, type NotarizationReceipt } from "./services/Notary.js"

export interface StapleSettings {
  /** Seconds to wait for the verdict to reach every replica. */
  readonly grace: number
  readonly attempts: number
  /** Seconds between attempts. */
  readonly backoff: number
}

export type NotarizeOutcome = Data.TaggedEnum<{
  AlreadyNotarized: {}
  Submitted: {
    readonly receipt: NotarizationReceipt
    /** Right holds the attempt that stapled. */
    readonly staple: Either.Either<number, StapleExhausted>
  }
}>

export const NotarizeOutcome = Data.taggedEnum<NotarizeOutcome>()

/**
 * Staples the ticket, retrying while the verdict propagates.
 */
export const stapleWithRetry = (path: string, settings: StapleSettings) =>
  Effect.gen(function* () {
    const notary = yield* Notary

    yield* Effect.log(`Waiting ${settings.grace}s for the ticket to propagate...`)
    yield* Effect.sleep(Duration.seconds(settings.grace))

    for (let attempt = 1; attempt <= settings.attempts; attempt++) {
      yield* Effect.log(`Stapling notarization ticket (attempt ${attempt}/${settings.attempts})...`)
      if (yield* notary.staple(path)) {
        yield* Effect.log(`✓ Stapled ${path}`)
        return attempt
      }
      if (attempt < settings.attempts) {
        yield* Effect.sleep(Duration.seconds(settings.backoff))
      }
    }

    return yield* new StapleExhausted({
      path,
      attempts: settings.attempts,
      message: `Stapling failed after ${settings.attempts} attempts; ${path} still verifies online. Retry later with: xcrun stapler staple "${path}"`,
    })
  })

/**
 * Submits the artifact unless Gatekeeper already accepts it. A rejection is
 * fatal and not retried; a failed staple is only a warning.
 */
export const notarizeArtifact = (
  path: string,
  credentials: CredentialSet,
  settings: StapleSettings
) =>
  Effect.gen(function* () {
    const gatekeeper = yield* Gatekeeper
    const notary = yield* Notary

    if (yield* gatekeeper.assess(path)) {
      yield* Effect.log(`✓ ${path} is already notarized, skipping submission`)
      return NotarizeOutcome.AlreadyNotarized()
    }

    const receipt = yield* notary.submit(path, credentials)
    const staple = yield* degradeToWarning(stapleWithRetry(path, settings))

    return NotarizeOutcome.Submitted({ receipt, staple })
  })
