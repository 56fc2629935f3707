/**
 * Notarization service - remote submission and ticket stapling
 */
import { Context, Effect, Option } from "effect"
import type { CredentialSet } from "../credentials.js"
import type { NotarizationRejected } from "../errors.js"

export interface NotarizationReceipt {
  readonly path: string
  readonly submissionId: Option.Option<string>
  readonly status: string
}

export interface NotaryService {
  /** Blocks until the remote authority has a verdict. Only "Accepted" succeeds. */
  readonly submit: (
    path: string,
    credentials: CredentialSet
  ) => Effect.Effect<NotarizationReceipt, NotarizationRejected>

  /** One stapling attempt; false until the verdict has propagated. */
  readonly staple: (path: string) => Effect.Effect<boolean>
}

export class Notary extends Context.Tag("release-pilot/Notary")<Notary, NotaryService>() {}
