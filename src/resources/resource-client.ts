// src/resources/resource-client.ts — Downstream hand-off for delegated requests
//
// The exchanged token is the only credential that leaves the gateway: the
// caller's own Authorization header and cookies are never forwarded.

import { GatewayError, isAbortError } from "../errors.js"
import { silentLogger, type Logger } from "../shared/logger.js"

export interface ResourceDefinition {
  name: string
  /** Scopes requested in the OBO exchange for this resource. */
  scopes: string[]
  /** Origin (and optional base path) the request is forwarded to. */
  baseUrl: string
  timeoutMs?: number
}

export type ResourceRegistry = ReadonlyMap<string, ResourceDefinition>

export interface ResourceRequest {
  method: string
  /** Path below the resource mount, e.g. "/user-info". Empty for the mount itself. */
  path: string
  /** Raw query string including the leading "?", or "". */
  query: string
  headers: Headers
  body?: ArrayBuffer | null
  requestId?: string
  signal?: AbortSignal
}

export interface ResourceClient {
  forward(resource: ResourceDefinition, accessToken: string, request: ResourceRequest): Promise<Response>
}

export interface HttpResourceClientOptions {
  /** Used when a resource sets no timeoutMs. Default 30 s. */
  defaultTimeoutMs?: number
  fetcher?: typeof fetch
  logger?: Logger
}

/** Request headers copied from the inbound request. Everything else is dropped. */
const FORWARDED_REQUEST_HEADERS = ["accept", "accept-language", "content-type", "if-none-match", "if-modified-since"]

/** Hop-by-hop headers (RFC 9110 §7.6.1) plus encodings fetch has already undone. */
const DROPPED_RESPONSE_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
  "content-encoding",
  "content-length",
  "set-cookie",
])

export function buildTargetUrl(baseUrl: string, path: string, query: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
  const suffix = path === "" || path.startsWith("/") ? path : `/${path}`
  return `${base}${suffix}${query}`
}

export class HttpResourceClient implements ResourceClient {
  private readonly defaultTimeoutMs: number
  private readonly fetcher: typeof fetch
  private readonly logger: Logger

  constructor(options: HttpResourceClientOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000
    this.fetcher = options.fetcher ?? fetch
    this.logger = options.logger ?? silentLogger
  }

  async forward(resource: ResourceDefinition, accessToken: string, request: ResourceRequest): Promise<Response> {
    const url = buildTargetUrl(resource.baseUrl, request.path, request.query)
    const headers = new Headers()
    for (const name of FORWARDED_REQUEST_HEADERS) {
      const value = request.headers.get(name)
      if (value !== null) headers.set(name, value)
    }
    headers.set("Authorization", `Bearer ${accessToken}`)
    if (request.requestId) headers.set("X-Request-Id", request.requestId)

    const timeout = AbortSignal.timeout(resource.timeoutMs ?? this.defaultTimeoutMs)
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout
    const hasBody = request.method !== "GET" && request.method !== "HEAD" && request.body

    let upstream: Response
    try {
      upstream = await this.fetcher(url, {
        method: request.method,
        headers,
        body: hasBody ? request.body : undefined,
        signal,
        redirect: "manual",
      })
    } catch (err) {
      // Caller went away: surface the abort itself
      if (request.signal?.aborted && isAbortError(err)) throw err
      const timedOut = timeout.aborted
      this.logger.warn("resource request failed", { resource: resource.name, timedOut })
      throw new GatewayError(
        "RESOURCE_UNAVAILABLE",
        timedOut ? `Resource ${resource.name} timed out` : `Resource ${resource.name} is unreachable`,
        { resource: resource.name, timedOut },
        { cause: err },
      )
    }

    const responseHeaders = new Headers()
    upstream.headers.forEach((value, name) => {
      if (!DROPPED_RESPONSE_HEADERS.has(name.toLowerCase())) responseHeaders.set(name, value)
    })

    this.logger.debug("resource responded", { resource: resource.name, status: upstream.status })
    return new Response(upstream.body, { status: upstream.status, statusText: upstream.statusText, headers: responseHeaders })
  }
}
