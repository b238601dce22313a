// src/audit/audit-log.ts — Structured security audit trail
//
// One JSON object per event, written to a pluggable sink (stdout by default, for
// log shippers and SIEM ingestion). Events name identities, never tokens: string
// details still pass through SecretRedactor before they reach the sink.

import { ulid } from "ulid"
import { SecretRedactor } from "../safety/secret-redactor.js"
import { defaultTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export type AuditEventType =
  | "token_validated"
  | "token_rejected"
  | "authorization_denied"
  | "obo_token_acquired"
  | "obo_token_failed"
  | "obo_cache_cleared"
  | "jwks_invalidated"

export interface AuditEvent {
  id: string
  timestamp: string
  event: AuditEventType
  success: boolean
  requestId?: string
  subject?: string
  /** Tags for downstream routing; cross-user denials carry "security". */
  tags: string[]
  details: Record<string, unknown>
}

export interface AuditInput {
  event: AuditEventType
  success: boolean
  requestId?: string
  subject?: string
  tags?: string[]
  details?: Record<string, unknown>
}

export interface AuditSink {
  write(event: AuditEvent): void
}

export class ConsoleAuditSink implements AuditSink {
  write(event: AuditEvent): void {
    console.log(JSON.stringify(event))
  }
}

/** Keeps events in memory; used by tests and the admin diagnostics path. */
export class InMemoryAuditSink implements AuditSink {
  readonly events: AuditEvent[] = []

  write(event: AuditEvent): void {
    this.events.push(event)
  }

  ofType(type: AuditEventType): AuditEvent[] {
    return this.events.filter((e) => e.event === type)
  }
}

export class AuditLog {
  constructor(
    private readonly sink: AuditSink = new ConsoleAuditSink(),
    private readonly time: TimeProvider = defaultTimeProvider,
    private readonly redactor: SecretRedactor = new SecretRedactor(),
    private readonly nextId: () => string = () => ulid(),
  ) {}

  record(input: AuditInput): AuditEvent {
    const event: AuditEvent = {
      id: this.nextId(),
      timestamp: new Date(this.time.now()).toISOString(),
      event: input.event,
      success: input.success,
      requestId: input.requestId,
      subject: input.subject,
      tags: input.tags ?? [],
      details: this.redactDetails(input.details ?? {}),
    }
    this.sink.write(event)
    return event
  }

  private redactDetails(details: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(details)) {
      out[key] = typeof value === "string" ? this.redactor.redact(value) : value
    }
    return out
  }
}
