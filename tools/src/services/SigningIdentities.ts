/**
 * Signing identity discovery - locally installed code signing identities
 */
import { Context, Effect } from "effect"

export interface SigningIdentitiesService {
  /** Every valid identity whose name contains `identityClass`, in keychain order. */
  readonly find: (identityClass: string) => Effect.Effect<ReadonlyArray<string>>
}

export class SigningIdentities extends Context.Tag("release-pilot/SigningIdentities")<
  SigningIdentities,
  SigningIdentitiesService
>() {}
