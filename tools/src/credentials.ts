/**
 * Credential resolution - signing identity and notarization account
 */
import { Config, Effect, Option, Redacted, pipe } from "effect"
import { CREDENTIAL_KEYS, identityClass } from "./config.js"
import { MissingCredential } from "./errors.js"
import { SigningIdentities } from "./services/SigningIdentities.js"

export interface CredentialSet {
  readonly signingIdentity: string
  readonly accountId: string
  readonly accountSecret: Redacted.Redacted<string>
  readonly organizationId: string
}

const IDENTITY_DISPLAY_LENGTH = 50

const isPresent = (value: string) => value.trim() !== ""

const optionalString = (key: string) =>
  pipe(
    Config.string(key),
    Config.option,
    Config.map(value => Option.filter(value, isPresent))
  )

const optionalSecret = (key: string) =>
  pipe(
    Config.redacted(key),
    Config.option,
    Config.map(value => Option.filter(value, secret => isPresent(Redacted.value(secret))))
  )

/**
 * First installed identity of the configured class, used when no signing
 * identity was supplied.
 */
const discoverIdentity = Effect.gen(function* () {
  const cls = yield* identityClass
  const identities = yield* SigningIdentities
  const found = Option.fromNullable((yield* identities.find(cls))[0])

  if (Option.isSome(found)) {
    yield* Effect.log(`Auto-detected signing identity: ${found.value}`)
  }
  return found
})

export const resolveCredentials = Effect.gen(function* () {
  const supplied = yield* Config.all({
    signingIdentity: optionalString(CREDENTIAL_KEYS.signingIdentity),
    organizationId: optionalString(CREDENTIAL_KEYS.organizationId),
    accountId: optionalString(CREDENTIAL_KEYS.accountId),
    accountSecret: optionalSecret(CREDENTIAL_KEYS.accountSecret),
  })

  const signingIdentity = Option.isSome(supplied.signingIdentity)
    ? supplied.signingIdentity
    : yield* discoverIdentity

  const resolved = Option.all({ ...supplied, signingIdentity })
  if (Option.isSome(resolved)) {
    return resolved.value satisfies CredentialSet
  }

  const missing = (
    [
      ["signingIdentity", signingIdentity],
      ["organizationId", supplied.organizationId],
      ["accountId", supplied.accountId],
      ["accountSecret", supplied.accountSecret],
    ] as const
  )
    .filter(([, value]) => Option.isNone<string | Redacted.Redacted<string>>(value))
    .map(([field]) => CREDENTIAL_KEYS[field])

  return yield* MissingCredential.of(missing)
})

/**
 * Display lines for a resolved set. Only the signing identity is shown, and
 * only its first 50 characters.
 */
export const maskCredentials = (credentials: CredentialSet): ReadonlyArray<string> => [
  `✓ ${CREDENTIAL_KEYS.signingIdentity}: ${credentials.signingIdentity.slice(0, IDENTITY_DISPLAY_LENGTH)}...`,
  `✓ ${CREDENTIAL_KEYS.organizationId}: [set]`,
  `✓ ${CREDENTIAL_KEYS.accountId}: [set]`,
  `✓ ${CREDENTIAL_KEYS.accountSecret}: [set]`,
]

/**
 * Child process environment carrying the credentials to the builder.
 */
export const credentialEnv = (credentials: CredentialSet): Record<string, string> => ({
  [CREDENTIAL_KEYS.signingIdentity]: credentials.signingIdentity,
  [CREDENTIAL_KEYS.accountId]: credentials.accountId,
  [CREDENTIAL_KEYS.accountSecret]: Redacted.value(credentials.accountSecret),
  [CREDENTIAL_KEYS.organizationId]: credentials.organizationId,
})
