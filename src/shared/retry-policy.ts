// src/shared/retry-policy.ts — Bounded retry with exponential backoff
//
// The policy never decides on its own what is retryable: a classifier maps each
// failure to terminal or transient. Terminal failures surface immediately,
// transient ones are retried until the attempt ceiling, then wrapped in
// RetryExhaustedError.

import { setTimeout as delay } from "node:timers/promises"

export type RetryDecision =
  | { retry: false }
  | { retry: true; /** Upstream-supplied wait (e.g. Retry-After), capped by maxDelayMs */ delayHintMs?: number }

export type RetryClassifier = (err: unknown) => RetryDecision

export interface RetryPolicyConfig {
  /** Total attempts including the first one. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** 0..1: fraction of the computed delay randomized in either direction. */
  jitter: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2_000,
  jitter: 0,
}

export class RetryExhaustedError extends Error {
  readonly name = "RetryExhaustedError"

  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempts`, { cause: lastError })
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}

export class RetryPolicy {
  private readonly config: RetryPolicyConfig

  constructor(
    config: Partial<RetryPolicyConfig>,
    private readonly classify: RetryClassifier,
    private readonly sleep: Sleep = abortableSleep,
    private readonly random: () => number = Math.random,
  ) {
    this.config = { ...DEFAULT_RETRY_POLICY, ...config }
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer (got ${this.config.maxAttempts})`)
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts
  }

  /** Delay before attempt `attempt + 1`, given that `attempt` (1-based) just failed. */
  backoffFor(attempt: number): number {
    const exponential = this.config.baseDelayMs * Math.pow(2, attempt - 1)
    const capped = Math.min(exponential, this.config.maxDelayMs)
    if (this.config.jitter <= 0) return capped
    const spread = capped * this.config.jitter
    return Math.max(0, Math.round(capped + (this.random() * 2 - 1) * spread))
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted()
      try {
        return await operation(attempt)
      } catch (err) {
        if (signal?.aborted) throw err

        const decision = this.classify(err)
        if (!decision.retry) throw err
        if (attempt >= this.config.maxAttempts) throw new RetryExhaustedError(attempt, err)

        const wait = decision.delayHintMs !== undefined
          ? Math.min(decision.delayHintMs, this.config.maxDelayMs)
          : this.backoffFor(attempt)
        await this.sleep(wait, signal)
      }
    }
  }
}
