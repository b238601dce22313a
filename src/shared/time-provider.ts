// src/shared/time-provider.ts — Injectable clock and expiry arithmetic
//
// Caches and validators read time through this interface so expiry, TTL and
// safety-margin behavior can be driven deterministically in tests. Expiry
// checks go through the helpers below rather than comparing raw timestamps.

export interface TimeProvider {
  /** Current time in Unix milliseconds */
  now(): number
  /** Current time in Unix seconds */
  nowSeconds(): number
}

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now()
  }

  nowSeconds(): number {
    return Math.floor(Date.now() / 1000)
  }
}

/** Clock that only moves through advance(). */
export class MockTimeProvider implements TimeProvider {
  private nowMs: number

  constructor(initialMs: number = Date.now()) {
    this.nowMs = initialMs
  }

  now(): number {
    return this.nowMs
  }

  nowSeconds(): number {
    return Math.floor(this.nowMs / 1000)
  }

  advance(ms: number): void {
    this.nowMs += ms
  }
}

export const defaultTimeProvider: TimeProvider = new SystemTimeProvider()

/** Milliseconds left until `deadline` (epoch ms or Date); zero or negative once reached. */
export function msUntil(time: TimeProvider, deadline: Date | number): number {
  const at = typeof deadline === "number" ? deadline : deadline.getTime()
  return at - time.now()
}

/** Whether a JWT NumericDate lies in the past, tolerating `leewaySeconds` of clock skew. */
export function hasPassed(time: TimeProvider, epochSeconds: number, leewaySeconds = 0): boolean {
  return epochSeconds <= time.nowSeconds() - leewaySeconds
}
