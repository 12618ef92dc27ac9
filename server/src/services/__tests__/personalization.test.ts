import { describe, expect, it } from "vitest"
import { TEST_IDENTITY, TOKYO_PREFERENCES } from "../../__tests__/fakes"
import type { AuthOutcome } from "../../types"
import { decideAreaMode, decideCameraMode } from "../personalization"

const authenticated: AuthOutcome = { kind: "authenticated", identity: TEST_IDENTITY }
const unauthenticated: AuthOutcome = { kind: "unauthenticated" }

describe("decideAreaMode", () => {
  it("personalizes only when the caller is authenticated and sent preferences", () => {
    expect(decideAreaMode(authenticated, TOKYO_PREFERENCES)).toBe("personalized")
    expect(decideAreaMode(authenticated, null)).toBe("basic")
    expect(decideAreaMode(unauthenticated, TOKYO_PREFERENCES)).toBe("basic")
    expect(decideAreaMode(unauthenticated, null)).toBe("basic")
  })

  it("treats an undefined profile like an absent one", () => {
    expect(decideAreaMode(authenticated, undefined)).toBe("basic")
  })
})

describe("decideCameraMode", () => {
  it("personalizes whenever preferences are present", () => {
    expect(decideCameraMode(TEST_IDENTITY, TOKYO_PREFERENCES)).toBe("personalized")
    expect(decideCameraMode(TEST_IDENTITY, null)).toBe("basic")
  })
})
