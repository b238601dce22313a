// tests/resources/resource-client.test.ts — Downstream hand-off

import { describe, it, expect } from "vitest"
import { HttpResourceClient, buildTargetUrl, type ResourceDefinition } from "../../src/resources/resource-client.js"

const PAYROLL: ResourceDefinition = {
  name: "payroll",
  scopes: ["api://payroll/read"],
  baseUrl: "http://payroll.test/api/payroll/",
}

interface Captured {
  url: string
  init?: RequestInit
}

function recordingFetcher(response: () => Response) {
  const seen: Captured[] = []
  const fetcher: typeof fetch = async (input, init) => {
    seen.push({ url: String(input), init })
    return response()
  }
  return { fetcher, seen }
}

/** Never answers; rejects with the signal's reason once aborted. */
const hangingFetcher: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal
    if (!signal) return
    if (signal.aborted) return reject(signal.reason)
    signal.addEventListener("abort", () => reject(signal.reason))
  })

describe("buildTargetUrl", () => {
  it("joins base, path and query without doubling slashes", () => {
    expect(buildTargetUrl("http://a.test/base/", "/user-info", "?x=1")).toBe("http://a.test/base/user-info?x=1")
    expect(buildTargetUrl("http://a.test/base", "", "")).toBe("http://a.test/base")
    expect(buildTargetUrl("http://a.test", "items", "")).toBe("http://a.test/items")
  })
})

describe("HttpResourceClient", () => {
  it("sends only the exchanged token and an allow-list of request headers", async () => {
    const { fetcher, seen } = recordingFetcher(() => new Response("{}", { status: 200 }))
    const client = new HttpResourceClient({ fetcher })
    const body = await new Response('{"period":"2025-10"}').arrayBuffer()

    await client.forward(PAYROLL, "downstream-token", {
      method: "POST",
      path: "/user-info",
      query: "?x=1",
      headers: new Headers({
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: "Bearer user-token",
        Cookie: "session=abc",
        "X-Forwarded-For": "10.0.0.1",
      }),
      body,
      requestId: "req-1",
    })

    expect(seen).toHaveLength(1)
    const [call] = seen
    expect(call.url).toBe("http://payroll.test/api/payroll/user-info?x=1")
    expect(call.init?.method).toBe("POST")
    expect(call.init?.redirect).toBe("manual")
    expect(call.init?.body).toBe(body)

    const sent = new Headers(call.init?.headers)
    expect(sent.get("authorization")).toBe("Bearer downstream-token")
    expect(sent.get("accept")).toBe("application/json")
    expect(sent.get("content-type")).toBe("application/json")
    expect(sent.get("x-request-id")).toBe("req-1")
    expect(sent.get("cookie")).toBeNull()
    expect(sent.get("x-forwarded-for")).toBeNull()
  })

  it("sends no body for GET", async () => {
    const { fetcher, seen } = recordingFetcher(() => new Response(null, { status: 204 }))
    await new HttpResourceClient({ fetcher }).forward(PAYROLL, "t", {
      method: "GET",
      path: "",
      query: "",
      headers: new Headers(),
      body: new ArrayBuffer(4),
    })
    expect(seen[0].init?.body).toBeUndefined()
  })

  it("returns the resource's status and body, minus hop-by-hop and cookie headers", async () => {
    const { fetcher } = recordingFetcher(
      () =>
        new Response('{"id":"E-100"}', {
          status: 201,
          headers: {
            "Content-Type": "application/json",
            "X-Custom": "kept",
            Connection: "close",
            "Set-Cookie": "downstream=1",
          },
        }),
    )
    const res = await new HttpResourceClient({ fetcher }).forward(PAYROLL, "t", {
      method: "GET",
      path: "/x",
      query: "",
      headers: new Headers(),
    })

    expect(res.status).toBe(201)
    expect(await res.text()).toBe('{"id":"E-100"}')
    expect(res.headers.get("x-custom")).toBe("kept")
    expect(res.headers.get("content-type")).toBe("application/json")
    expect(res.headers.get("connection")).toBeNull()
    expect(res.headers.get("set-cookie")).toBeNull()
  })

  it("maps an unreachable resource to RESOURCE_UNAVAILABLE", async () => {
    const fetcher: typeof fetch = async () => {
      throw new TypeError("fetch failed")
    }
    const client = new HttpResourceClient({ fetcher })
    await expect(
      client.forward(PAYROLL, "t", { method: "GET", path: "", query: "", headers: new Headers() }),
    ).rejects.toMatchObject({
      code: "RESOURCE_UNAVAILABLE",
      httpStatus: 502,
      message: "Resource payroll is unreachable",
      context: { resource: "payroll", timedOut: false },
    })
  })

  it("times out a slow resource", async () => {
    const client = new HttpResourceClient({ fetcher: hangingFetcher })
    await expect(
      client.forward({ ...PAYROLL, timeoutMs: 20 }, "t", { method: "GET", path: "", query: "", headers: new Headers() }),
    ).rejects.toMatchObject({
      code: "RESOURCE_UNAVAILABLE",
      message: "Resource payroll timed out",
      context: { resource: "payroll", timedOut: true },
    })
  })

  it("rethrows the caller's own abort untouched", async () => {
    const controller = new AbortController()
    controller.abort()
    const client = new HttpResourceClient({ fetcher: hangingFetcher })
    await expect(
      client.forward(PAYROLL, "t", {
        method: "GET",
        path: "",
        query: "",
        headers: new Headers(),
        signal: controller.signal,
      }),
    ).rejects.toMatchObject({ name: "AbortError" })
  })
})
