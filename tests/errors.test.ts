// tests/errors.test.ts — Error codes, statuses and wrapping

import { describe, it, expect } from "vitest"
import { ConfigError, GatewayError, isAbortError, toGatewayError } from "../src/errors.js"

describe("GatewayError", () => {
  it("derives status and category from the code", () => {
    const expired = new GatewayError("TOKEN_EXPIRED", "Token has expired")
    expect(expired.httpStatus).toBe(401)
    expect(expired.category).toBe("authentication")

    const timeout = new GatewayError("OBO_UPSTREAM_TIMEOUT", "slow")
    expect(timeout.httpStatus).toBe(504)
    expect(timeout.category).toBe("upstream")

    expect(new GatewayError("OBO_CONSENT_REQUIRED", "consent").category).toBe("delegation")
    expect(new GatewayError("FORBIDDEN_CROSS_USER", "no").category).toBe("authorization")
    expect(new GatewayError("REQUEST_ABORTED", "gone").category).toBe("request")
  })

  it("serializes without context", () => {
    const error = new GatewayError("RESOURCE_UNKNOWN", "Unknown resource: x", { resource: "x" })
    expect(JSON.parse(JSON.stringify(error))).toEqual({
      error: "GatewayError",
      code: "RESOURCE_UNKNOWN",
      message: "Unknown resource: x",
    })
  })
})

describe("toGatewayError", () => {
  it("keeps gateway errors as they are", () => {
    const original = new GatewayError("JWKS_UNAVAILABLE", "down")
    expect(toGatewayError(original)).toBe(original)
  })

  it("maps aborts to REQUEST_ABORTED and anything else to the fallback", () => {
    const abort = Object.assign(new Error("aborted"), { name: "AbortError" })
    expect(toGatewayError(abort).code).toBe("REQUEST_ABORTED")

    const wrapped = toGatewayError(new Error("boom"), "RESOURCE_UNAVAILABLE")
    expect(wrapped.code).toBe("RESOURCE_UNAVAILABLE")
    expect(wrapped.message).toBe("boom")
    expect(toGatewayError("plain").code).toBe("INTERNAL_ERROR")
  })

  it("recognises abort and timeout errors", () => {
    expect(isAbortError(Object.assign(new Error("t"), { name: "TimeoutError" }))).toBe(true)
    expect(isAbortError(new Error("x"))).toBe(false)
    expect(isAbortError("AbortError")).toBe(false)
  })
})

describe("ConfigError", () => {
  it("lists every problem in its message", () => {
    const error = new ConfigError(["A is required", "B must be positive"])
    expect(error.problems).toEqual(["A is required", "B must be positive"])
    expect(error.message).toBe("Invalid gateway configuration: A is required; B must be positive")
  })
})
