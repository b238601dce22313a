// src/shared/logger.ts — Tagged console logger with secret sanitization
//
// Output keeps the `[tag] message` shape used across the service. Every message
// and every string field of structured data goes through SecretRedactor before
// it reaches the console.

import { SecretRedactor } from "../safety/secret-redactor.js"

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  debug(message: string, data?: Record<string, unknown>): void
}

type Level = "info" | "warn" | "error" | "debug"

export class ConsoleLogger implements Logger {
  constructor(
    private readonly tag: string,
    private readonly debugEnabled: boolean = process.env.GATEWAY_DEBUG === "true",
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data)
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.debugEnabled) return
    this.write("debug", message, data)
  }

  private write(level: Level, message: string, data?: Record<string, unknown>): void {
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : ""
    const line = `[${this.tag}] ${message}${suffix}`
    if (level === "error") console.error(line)
    else if (level === "warn") console.warn(line)
    else console.log(line)
  }
}

export class SanitizedLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly sanitizer: SecretRedactor = new SecretRedactor(),
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    this.inner.info(this.clean(message), this.cleanData(data))
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.inner.warn(this.clean(message), this.cleanData(data))
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.inner.error(this.clean(message), this.cleanData(data))
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.inner.debug(this.clean(message), this.cleanData(data))
  }

  private clean(message: string): string {
    return this.sanitizer.redact(message)
  }

  private cleanData(data?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!data) return undefined
    const cleaned: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      cleaned[key] = typeof value === "string" ? this.clean(value) : value
    }
    return cleaned
  }
}

/** Logger that discards everything (tests, embedded use). */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
}

export function createLogger(tag: string, debugEnabled?: boolean, redactor?: SecretRedactor): Logger {
  return new SanitizedLogger(new ConsoleLogger(tag, debugEnabled), redactor)
}
