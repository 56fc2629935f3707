/**
 * Local verification oracle - code signature and trust policy checks
 */
import { Context, Effect } from "effect"

export interface GatekeeperService {
  /**
   * Whether the local trust policy accepts the artifact right now. Also serves
   * as the probe for "has the remote verdict propagated yet".
   */
  readonly assess: (path: string) => Effect.Effect<boolean>

  readonly verifySignature: (path: string) => Effect.Effect<boolean>
}

export class Gatekeeper extends Context.Tag("release-pilot/Gatekeeper")<Gatekeeper, GatekeeperService>() {}
