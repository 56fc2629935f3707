/**
 * Build supervisor service - owns the builder child process
 */
import { Context, Data, Effect, Scope } from "effect"
import type { CredentialSet } from "../credentials.js"
import type { BuildLaunchFailed } from "../errors.js"

export interface ExitStatus {
  readonly exitCode: number
}

export type TerminateOutcome = Data.TaggedEnum<{
  Signalled: { readonly exitCode: number }
  AlreadyExited: { readonly exitCode: number }
  Failed: { readonly reason: string }
}>

export const TerminateOutcome = Data.taggedEnum<TerminateOutcome>()

export interface BuildHandle {
  readonly pid: number
  /** Epoch milliseconds, taken just before the spawn. */
  readonly startedAt: number
  readonly isAlive: Effect.Effect<boolean>
  /** SIGTERM, then reap. Never fails; the child may already be gone. */
  readonly terminate: Effect.Effect<TerminateOutcome>
  /** Waits for exit. Safe to call after terminate. */
  readonly join: Effect.Effect<ExitStatus>
}

export interface BuildSupervisorService {
  /**
   * Starts the builder without waiting for it. The child belongs to the
   * surrounding scope and is killed if still running when the scope closes.
   */
  readonly launch: (
    credentials: CredentialSet
  ) => Effect.Effect<BuildHandle, BuildLaunchFailed, Scope.Scope>
}

export class BuildSupervisor extends Context.Tag("release-pilot/BuildSupervisor")<
  BuildSupervisor,
  BuildSupervisorService
>() {}
