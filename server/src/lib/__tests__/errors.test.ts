import { describe, expect, it } from "vitest"
import { errorBody, ServiceError, statusForCode, toServiceError } from "../errors"

describe("ServiceError", () => {
  it("derives the HTTP status from its code", () => {
    expect(new ServiceError("AUTH_MISSING", "Authentication required").status).toBe(401)
    expect(statusForCode("AUTH_INVALID")).toBe(401)
    expect(statusForCode("PROVIDER_UNAVAILABLE")).toBe(503)
    expect(statusForCode("PAYLOAD_INVALID")).toBe(422)
    expect(statusForCode("INCOMPLETE_GENERATION")).toBe(422)
    expect(statusForCode("UPSTREAM_PROVIDER_ERROR")).toBe(500)
    expect(statusForCode("PERSISTENCE_FAILURE")).toBe(500)
    expect(statusForCode("NOT_FOUND")).toBe(404)
  })
})

describe("toServiceError", () => {
  it("passes service errors through", () => {
    const error = new ServiceError("NOT_FOUND", "History entry not found")

    expect(toServiceError(error)).toBe(error)
  })

  it("hides the message of unexpected errors", () => {
    const translated = toServiceError(new Error("connection reset by 10.0.0.1"))

    expect(translated.code).toBe("UPSTREAM_PROVIDER_ERROR")
    expect(translated.message).toBe("Upstream provider request failed")
    expect(toServiceError("boom", "Internal server error").message).toBe("Internal server error")
  })
})

describe("errorBody", () => {
  const now = new Date("2026-01-15T09:30:00.000Z")

  it("renders the JSON error envelope", () => {
    const error = new ServiceError("PAYLOAD_INVALID", "address is required", { path: "address" })

    expect(errorBody(error, now)).toEqual({
      error: {
        code: "PAYLOAD_INVALID",
        message: "address is required",
        timestamp: "2026-01-15T09:30:00.000Z",
        details: { path: "address" },
      },
    })
  })

  it("omits details when there are none", () => {
    expect(errorBody(new ServiceError("AUTH_MISSING", "Authentication required"), now)).toEqual({
      error: { code: "AUTH_MISSING", message: "Authentication required", timestamp: "2026-01-15T09:30:00.000Z" },
    })
  })
})
