// tests/obo/obo-exchanger.test.ts — On-Behalf-Of exchange, caching, retries, identity

import { describe, it, expect, beforeEach } from "vitest"
import { SignJWT } from "jose"
import {
  JWT_BEARER_GRANT,
  LocalDevelopmentExchanger,
  OboExchanger,
  TokenEndpointFailure,
  classifyTokenEndpointFailure,
  parseRetryAfter,
} from "../../src/obo/obo-exchanger.js"
import { OboTokenCache } from "../../src/obo/token-cache.js"
import { AuditLog, InMemoryAuditSink } from "../../src/audit/audit-log.js"
import { MockTimeProvider } from "../../src/shared/time-provider.js"
import {
  CLIENT_ID,
  CLIENT_SECRET,
  NOW_MS,
  TOKEN_URL,
  USER_1,
  USER_2,
  createMockIdp,
  jsonResponse,
  type MockIdp,
} from "../fixtures/mock-idp.js"

const SCOPES = ["api://payroll/read"]

function deferred() {
  let release: () => void = () => {}
  const promise = new Promise<void>((resolve) => {
    release = resolve
  })
  return { promise, release }
}

describe("OboExchanger", () => {
  let idp: MockIdp
  let time: MockTimeProvider
  let cache: OboTokenCache
  let sink: InMemoryAuditSink
  let waits: number[]
  let assertion: string

  function exchanger(overrides: { fetcher?: typeof fetch; attemptTimeoutMs?: number } = {}): OboExchanger {
    return new OboExchanger({
      credentials: { tokenUrl: TOKEN_URL, clientId: CLIENT_ID, clientSecret: CLIENT_SECRET },
      cache,
      retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitter: 0 },
      attemptTimeoutMs: overrides.attemptTimeoutMs ?? 5_000,
      fetcher: overrides.fetcher ?? idp.fetcher,
      sleep: async (ms) => {
        waits.push(ms)
      },
      time,
      audit: new AuditLog(sink, time),
    })
  }

  beforeEach(async () => {
    idp = await createMockIdp()
    time = new MockTimeProvider(NOW_MS)
    cache = new OboTokenCache({ safetyMarginSeconds: 60, time })
    sink = new InMemoryAuditSink()
    waits = []
    assertion = await idp.signUserToken()
  })

  it("posts a jwt-bearer on_behalf_of request with client credentials", async () => {
    await exchanger().exchange(assertion, SCOPES, { subject: USER_1 })

    expect(idp.state.tokenForms).toHaveLength(1)
    const form = idp.state.tokenForms[0]
    expect(Object.fromEntries(form)).toEqual({
      grant_type: JWT_BEARER_GRANT,
      client_id: CLIENT_ID,
      client_secret: CLIENT_SECRET,
      assertion,
      scope: "api://payroll/read",
      requested_token_use: "on_behalf_of",
    })
  })

  it("returns the token with expiry counted from the request start, and caches it", async () => {
    const obo = exchanger()
    const token = await obo.exchange(assertion, SCOPES, { subject: USER_1 })
    expect(token.expiresAt).toEqual(new Date(NOW_MS + 3_600_000))
    expect(token.acquiredAt).toEqual(new Date(NOW_MS))

    const again = await obo.exchange(assertion, SCOPES, { subject: USER_1 })
    expect(again.accessToken).toBe(token.accessToken)
    expect(idp.state.tokenRequests).toBe(1)
    expect(sink.ofType("obo_token_acquired")).toHaveLength(1)
  })

  it("coalesces concurrent exchanges for the same user and scopes into one request", async () => {
    const obo = exchanger()
    const tokens = await Promise.all(
      Array.from({ length: 10 }, () => obo.exchange(assertion, SCOPES, { subject: USER_1 })),
    )
    expect(idp.state.tokenRequests).toBe(1)
    expect(new Set(tokens.map((t) => t.accessToken)).size).toBe(1)
    expect(obo.inFlight).toBe(0)
  })

  it("shares one cache entry regardless of scope order", async () => {
    const obo = exchanger()
    await obo.exchange(assertion, ["b", "a"], { subject: USER_1 })
    await obo.exchange(assertion, ["a", "b", "a"], { subject: USER_1 })
    expect(idp.state.tokenRequests).toBe(1)
    expect(idp.state.tokenForms[0].get("scope")).toBe("a b")
  })

  it("re-exchanges once the cached token is inside the safety margin", async () => {
    const obo = exchanger()
    await obo.exchange(assertion, SCOPES, { subject: USER_1 })

    time.advance((3600 - 61) * 1000)
    await obo.exchange(assertion, SCOPES, { subject: USER_1 })
    expect(idp.state.tokenRequests).toBe(1)

    time.advance(1000)
    await obo.exchange(assertion, SCOPES, { subject: USER_1 })
    expect(idp.state.tokenRequests).toBe(2)
  })

  it("keeps separate entries per user", async () => {
    const obo = exchanger()
    const other = await idp.signUserToken({ oid: USER_2 })
    await obo.exchange(assertion, SCOPES, { subject: USER_1 })
    await obo.exchange(other, SCOPES, { subject: USER_2 })
    expect(idp.state.tokenRequests).toBe(2)
    expect(cache.size).toBe(2)
  })

  describe("terminal failures", () => {
    const cases = [
      [{ error: "invalid_grant", error_description: "AADSTS50013: Assertion failed signature validation." }, "OBO_ASSERTION_INVALID", 401],
      [{ error: "invalid_grant", suberror: "consent_required" }, "OBO_CONSENT_REQUIRED", 403],
      [{ error: "invalid_grant", error_description: "AADSTS65001: The user has not consented." }, "OBO_CONSENT_REQUIRED", 403],
      [{ error: "interaction_required" }, "OBO_CONSENT_REQUIRED", 403],
      [{ error: "unauthorized_client" }, "OBO_UNAUTHORIZED_CLIENT", 403],
      [{ error: "invalid_client" }, "OBO_UNAUTHORIZED_CLIENT", 403],
    ] as const

    for (const [body, code, status] of cases) {
      it(`maps ${body.error} (${code}) without retrying`, async () => {
        idp.state.tokenResponder = () => jsonResponse(body, 400)
        await expect(exchanger().exchange(assertion, SCOPES, { subject: USER_1 })).rejects.toMatchObject({
          code,
          httpStatus: status,
        })
        expect(idp.state.tokenRequests).toBe(1)
        expect(waits).toEqual([])
        expect(cache.size).toBe(0)
      })
    }

    it("audits the failure by code only", async () => {
      idp.state.tokenResponder = () => jsonResponse({ error: "invalid_grant" }, 400)
      await expect(exchanger().exchange(assertion, SCOPES, { subject: USER_1 })).rejects.toThrow()
      const [failed] = sink.ofType("obo_token_failed")
      expect(failed.subject).toBe(USER_1)
      expect(failed.success).toBe(false)
      expect(failed.details).toEqual({ scopes: SCOPES, code: "OBO_ASSERTION_INVALID" })
    })

    it("rejects a success response without access_token", async () => {
      idp.state.tokenResponder = () => jsonResponse({ token_type: "Bearer", expires_in: 3600 })
      await expect(exchanger().exchange(assertion, SCOPES, { subject: USER_1 })).rejects.toMatchObject({
        code: "OBO_UPSTREAM_UNAVAILABLE",
      })
      expect(idp.state.tokenRequests).toBe(1)
    })
  })

  describe("transient failures", () => {
    it("retries 5xx up to the ceiling, then reports the identity provider unavailable", async () => {
      idp.state.tokenResponder = () => jsonResponse({ error: "temporarily_unavailable" }, 503)
      const err = await exchanger()
        .exchange(assertion, SCOPES, { subject: USER_1 })
        .catch((e: unknown) => e)

      expect(err).toMatchObject({ code: "OBO_UPSTREAM_UNAVAILABLE", httpStatus: 502, context: { attempts: 3, status: 503 } })
      expect(idp.state.tokenRequests).toBe(3)
      expect(waits).toEqual([10, 20])
    })

    it("recovers when a retry succeeds", async () => {
      let calls = 0
      idp.state.tokenResponder = () =>
        ++calls === 1 ? jsonResponse({}, 500) : jsonResponse({ access_token: "opaque-token", expires_in: "3599" })
      const token = await exchanger().exchange(assertion, SCOPES, { subject: USER_1 })
      expect(token.accessToken).toBe("opaque-token")
      expect(token.expiresAt).toEqual(new Date(NOW_MS + 3_599_000))
      expect(idp.state.tokenRequests).toBe(2)
    })

    it("uses Retry-After on 429, capped at the maximum delay", async () => {
      let calls = 0
      idp.state.tokenResponder = () =>
        ++calls === 1
          ? jsonResponse({ error: "throttled" }, 429, { "Retry-After": "1" })
          : jsonResponse({ access_token: "opaque-token", expires_in: 3600 })
      await exchanger().exchange(assertion, SCOPES, { subject: USER_1 })
      expect(waits).toEqual([100])
    })

    it("reports a timeout when every attempt times out", async () => {
      let attempts = 0
      const hanging: typeof fetch = (_input, init) => {
        attempts++
        return new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal
          if (!signal) return
          signal.addEventListener("abort", () => reject(signal.reason), { once: true })
        })
      }
      await expect(
        exchanger({ fetcher: hanging, attemptTimeoutMs: 20 }).exchange(assertion, SCOPES, { subject: USER_1 }),
      ).rejects.toMatchObject({ code: "OBO_UPSTREAM_TIMEOUT", httpStatus: 504 })
      expect(attempts).toBe(3)
    })

    it("retries network errors", async () => {
      let attempts = 0
      const flaky: typeof fetch = async (input, init) => {
        if (++attempts === 1) throw new TypeError("fetch failed")
        return idp.fetcher(input, init)
      }
      await exchanger({ fetcher: flaky }).exchange(assertion, SCOPES, { subject: USER_1 })
      expect(attempts).toBe(2)
      expect(waits).toEqual([10])
    })
  })

  describe("identity", () => {
    it("rejects an exchanged token that represents a different user", async () => {
      const foreign = await new SignJWT({ oid: USER_2 })
        .setProtectedHeader({ alg: "HS256" })
        .sign(new TextEncoder().encode("test-secret-test-secret-test-secret"))
      idp.state.tokenResponder = () => jsonResponse({ access_token: foreign, expires_in: 3600 })

      await expect(exchanger().exchange(assertion, SCOPES, { subject: USER_1 })).rejects.toMatchObject({
        code: "OBO_IDENTITY_MISMATCH",
        httpStatus: 502,
      })
      expect(cache.size).toBe(0)
    })

    it("accepts opaque downstream tokens", async () => {
      idp.state.tokenResponder = () => jsonResponse({ access_token: "opaque-token", expires_in: 3600 })
      await expect(exchanger().exchange(assertion, SCOPES, { subject: USER_1 })).resolves.toMatchObject({
        accessToken: "opaque-token",
      })
    })
  })

  describe("cancellation", () => {
    it("one caller aborting does not cancel the exchange another caller is waiting on", async () => {
      const gate = deferred()
      idp.state.tokenResponder = async () => {
        await gate.promise
        return jsonResponse({ access_token: "opaque-token", expires_in: 3600 })
      }
      const obo = exchanger()
      const leaving = new AbortController()

      const first = obo.exchange(assertion, SCOPES, { subject: USER_1, signal: leaving.signal })
      const second = obo.exchange(assertion, SCOPES, { subject: USER_1 })
      leaving.abort(new DOMException("client disconnected", "AbortError"))
      await expect(first).rejects.toMatchObject({ name: "AbortError" })

      gate.release()
      await expect(second).resolves.toMatchObject({ accessToken: "opaque-token" })
      expect(idp.state.tokenRequests).toBe(1)
      expect(cache.size).toBe(1)
    })
  })

  describe("revocation", () => {
    it("does not cache a token whose exchange was in flight when the user's tokens were cleared", async () => {
      const entered = deferred()
      const gate = deferred()
      idp.state.tokenResponder = async () => {
        entered.release()
        await gate.promise
        return jsonResponse({ access_token: "pre-revocation", expires_in: 3600 })
      }
      const obo = exchanger()

      const pending = obo.exchange(assertion, SCOPES, { subject: USER_1 })
      await entered.promise
      cache.clearSubject(USER_1)
      gate.release()

      await expect(pending).resolves.toMatchObject({ accessToken: "pre-revocation" })
      expect(cache.size).toBe(0)

      idp.state.tokenResponder = null
      await obo.exchange(assertion, SCOPES, { subject: USER_1 })
      expect(idp.state.tokenRequests).toBe(2)
      expect(cache.size).toBe(1)
    })

    it("still caches when another user's tokens were cleared mid-flight", async () => {
      const entered = deferred()
      const gate = deferred()
      idp.state.tokenResponder = async () => {
        entered.release()
        await gate.promise
        return jsonResponse({ access_token: "opaque-token", expires_in: 3600 })
      }

      const pending = exchanger().exchange(assertion, SCOPES, { subject: USER_1 })
      await entered.promise
      cache.clearSubject(USER_2)
      gate.release()

      await pending
      expect(cache.size).toBe(1)
    })
  })

  it("requires at least one target scope", async () => {
    await expect(exchanger().exchange(assertion, [" "], { subject: USER_1 })).rejects.toMatchObject({
      code: "INTERNAL_ERROR",
    })
    expect(idp.state.tokenRequests).toBe(0)
  })
})

describe("classifyTokenEndpointFailure", () => {
  it("treats missing responses, 408, 429 and 5xx as transient", () => {
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "down" }))).toEqual({ kind: "transient" })
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "x", status: 408 })).kind).toBe("transient")
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "x", status: 429, retryAfterMs: 5 }))).toEqual({
      kind: "transient",
      retryAfterMs: 5,
    })
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "x", status: 502 })).kind).toBe("transient")
  })

  it("treats bare 401/403 as an unauthorized client and other 4xx as upstream failure", () => {
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "x", status: 401 }))).toEqual({
      kind: "terminal",
      code: "OBO_UNAUTHORIZED_CLIENT",
    })
    expect(classifyTokenEndpointFailure(new TokenEndpointFailure({ message: "x", status: 404 }))).toEqual({
      kind: "terminal",
      code: "OBO_UPSTREAM_UNAVAILABLE",
    })
  })
})

describe("parseRetryAfter", () => {
  it("reads delta-seconds and HTTP dates", () => {
    expect(parseRetryAfter("2", 0)).toBe(2000)
    expect(parseRetryAfter(new Date(10_000).toUTCString(), 4_000)).toBe(6_000)
    expect(parseRetryAfter("soon", 0)).toBeUndefined()
    expect(parseRetryAfter(null, 0)).toBeUndefined()
  })
})

describe("LocalDevelopmentExchanger", () => {
  it("returns a fixed local token without contacting anything", async () => {
    const time = new MockTimeProvider(NOW_MS)
    const token = await new LocalDevelopmentExchanger(time).exchange("", SCOPES)
    expect(token.accessToken).toBe("local-development")
    expect(token.expiresAt).toEqual(new Date(NOW_MS + 3_600_000))
    expect(token.scopes).toEqual(SCOPES)
  })
})
