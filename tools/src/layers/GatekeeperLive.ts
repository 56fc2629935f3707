/**
 * Live implementation of Gatekeeper service
 */
import { Effect, Layer } from "effect"
import { Command } from "@effect/platform"
import { Gatekeeper } from "../services/Gatekeeper.js"
import { makeRunner } from "./command.js"

export const GatekeeperLive = Layer.effect(
  Gatekeeper,
  Effect.gen(function* () {
    const runner = yield* makeRunner

    return Gatekeeper.of({
      assess: (path) =>
        runner.succeeds(
          Command.make("spctl", "-a", "-t", "open", "--context", "context:primary-signature", path)
        ),

      verifySignature: (path) => runner.succeeds(Command.make("codesign", "-v", path)),
    })
  })
)
