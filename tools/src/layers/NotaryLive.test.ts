import { describe, expect, it } from "vitest"
import { Option, Redacted } from "effect"
import { isAccepted, notarizeArgs, parseSubmission } from "./NotaryLive.js"

const acceptedOutput = `Conducting pre-submission checks for App_1.0.0_aarch64.dmg and initiating connection to the Apple notary service...
Submission ID received
  id: 0f3c2a9e-1111-4222-8333-944455556666
Successfully uploaded file
  id: 0f3c2a9e-1111-4222-8333-944455556666
  path: /build/dmg/App_1.0.0_aarch64.dmg
Waiting for processing to complete.
Current status: In Progress....
Processing complete
  id: 0f3c2a9e-1111-4222-8333-944455556666
  status: Accepted
`

describe("parseSubmission", () => {
  it("reads the id and the final status", () => {
    const parsed = parseSubmission(acceptedOutput)

    expect(Option.getOrNull(parsed.submissionId)).toBe("0f3c2a9e-1111-4222-8333-944455556666")
    expect(Option.getOrNull(parsed.status)).toBe("Accepted")
  })

  it("does not mistake the progress line for a verdict", () => {
    const parsed = parseSubmission("Current status: In Progress....\n")

    expect(Option.isNone(parsed.status)).toBe(true)
  })

  it("takes the last status line", () => {
    const parsed = parseSubmission("  status: In Progress\n  status: Invalid\n")

    expect(Option.getOrNull(parsed.status)).toBe("Invalid")
  })
})

describe("isAccepted", () => {
  it("matches Accepted in any case", () => {
    expect(isAccepted("Accepted")).toBe(true)
    expect(isAccepted(" ACCEPTED ")).toBe(true)
    expect(isAccepted("Invalid")).toBe(false)
  })
})

describe("notarizeArgs", () => {
  it("passes the account credentials to notarytool", () => {
    const args = notarizeArgs({
      signingIdentity: "Developer ID Application: Test Org (TEAM000001)",
      accountId: "dev@example.com",
      accountSecret: Redacted.make("test-secret"),
      organizationId: "TEAM000001",
    })

    expect(args).toEqual([
      "--apple-id",
      "dev@example.com",
      "--password",
      "test-secret",
      "--team-id",
      "TEAM000001",
    ])
  })
})
