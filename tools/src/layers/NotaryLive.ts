/**
 * Live implementation of Notary service
 */
import { Effect, Layer, Option, Redacted, pipe } from "effect"
import { Command } from "@effect/platform"
import { Notary, type NotarizationReceipt } from "../services/Notary.js"
import type { CredentialSet } from "../credentials.js"
import { NotarizationRejected } from "../errors.js"
import { makeRunner } from "./command.js"

const ACCEPTED = "accepted"

/**
 * Reads the submission id and final status out of `notarytool submit --wait`
 * output. The last `status:` line is the verdict.
 */
export const parseSubmission = (output: string) => {
  const statuses = [...output.matchAll(/^\s*status:\s*(.+?)\s*$/gim)].map(match => match[1])
  const id = output.match(/^\s*id:\s*(\S+)/im)?.[1]

  return {
    submissionId: Option.fromNullable(id),
    status: Option.fromNullable(statuses.at(-1)),
  }
}

export const isAccepted = (status: string) => status.trim().toLowerCase() === ACCEPTED

/**
 * Credential flags for notarytool. The secret is unwrapped only here.
 */
export const notarizeArgs = (credentials: CredentialSet) => [
  "--apple-id",
  credentials.accountId,
  "--password",
  Redacted.value(credentials.accountSecret),
  "--team-id",
  credentials.organizationId,
]

export const NotaryLive = Layer.effect(
  Notary,
  Effect.gen(function* () {
    const runner = yield* makeRunner

    const submit = (path: string, credentials: CredentialSet) =>
      Effect.gen(function* () {
        yield* Effect.log(`Submitting ${path} for notarization...`)

        const result = yield* pipe(
          runner.capture(
            Command.make("xcrun", "notarytool", "submit", path, ...notarizeArgs(credentials), "--wait")
          ),
          Effect.mapError(
            error =>
              new NotarizationRejected({
                path,
                exitCode: -1,
                output: "",
                message: `notarytool could not run: ${error.message}`,
              })
          )
        )

        const output = `${result.stdout}${result.stderr}`
        if (result.exitCode !== 0) {
          return yield* new NotarizationRejected({
            path,
            exitCode: result.exitCode,
            output,
            message: `Notarization failed for ${path} (notarytool exited with ${result.exitCode}). Inspect with: xcrun notarytool history`,
          })
        }

        const { submissionId, status } = parseSubmission(output)
        if (Option.isNone(status) || !isAccepted(status.value)) {
          const verdict = Option.getOrElse(status, () => "no status")
          const log = Option.match(submissionId, {
            onNone: () => "xcrun notarytool history",
            onSome: id => `xcrun notarytool log ${id}`,
          })
          return yield* new NotarizationRejected({
            path,
            exitCode: result.exitCode,
            output,
            message: `Notarization of ${path} was not accepted (${verdict}). Inspect with: ${log}`,
          })
        }

        yield* Effect.log(`✓ Notarization accepted for ${path}`)
        return { path, submissionId, status: status.value } satisfies NotarizationReceipt
      })

    const staple = (path: string) =>
      runner.succeeds(Command.make("xcrun", "stapler", "staple", path))

    return Notary.of({ submit, staple })
  })
)
