// src/shared/single-flight.ts — Per-key in-flight call coalescing
//
// N concurrent callers for the same key share exactly one execution of the
// underlying function. Each caller can stop waiting through its own AbortSignal;
// the shared execution is aborted only when its last waiter has gone, so one
// client disconnecting never cancels work another client is still waiting on.

interface Flight<T> {
  promise: Promise<T>
  controller: AbortController
  waiters: number
}

export class SingleFlight<T> {
  private readonly flights = new Map<string, Flight<T>>()

  /**
   * Run `fn` for `key`, or join the execution already in progress for it.
   * `fn` receives a signal that fires once every waiter has aborted.
   */
  run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted()

    let flight = this.flights.get(key)
    if (!flight) {
      const controller = new AbortController()
      const promise = (async () => fn(controller.signal))().finally(() => {
        if (this.flights.get(key)?.controller === controller) {
          this.flights.delete(key)
        }
      })
      flight = { promise, controller, waiters: 0 }
      this.flights.set(key, flight)
    }

    return this.join(key, flight, signal)
  }

  /** True while an execution for `key` is in progress. */
  isInFlight(key: string): boolean {
    return this.flights.has(key)
  }

  get size(): number {
    return this.flights.size
  }

  private join(key: string, flight: Flight<T>, signal?: AbortSignal): Promise<T> {
    flight.waiters++
    if (!signal) return flight.promise

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        flight.waiters--
        if (flight.waiters === 0) {
          // Abandoned: later callers must start a fresh execution, not join a cancelled one
          if (this.flights.get(key) === flight) this.flights.delete(key)
          flight.controller.abort(signal.reason)
        }
        reject(signal.reason)
      }
      signal.addEventListener("abort", onAbort, { once: true })
      flight.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort)
          resolve(value)
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort)
          reject(err)
        },
      )
    })
  }
}
