/**
 * Rate Limiter
 *
 * Enforces a minimum interval between remote calls. Callers await
 * `acquire()` immediately before each request; there is no cancellation.
 */

export const DEFAULT_REQUEST_INTERVAL_MS = 200

export interface RateLimiterOptions {
  /** Minimum time between two acquisitions */
  readonly minIntervalMs?: number | undefined
  readonly now?: (() => number) | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class RateLimiter {
  readonly minIntervalMs: number
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private lastAcquired: number | undefined
  private queue: Promise<void> = Promise.resolve()

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_REQUEST_INTERVAL_MS
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * Resolve once `minIntervalMs` has passed since the previous acquisition.
   * Concurrent callers are served one after another.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.wait())
    this.queue = turn
    return turn
  }

  /**
   * Milliseconds until the next acquisition may proceed.
   */
  timeUntilNext(): number {
    if (this.lastAcquired === undefined) return 0
    return Math.max(0, this.lastAcquired + this.minIntervalMs - this.now())
  }

  private async wait(): Promise<void> {
    const delay = this.timeUntilNext()
    if (delay > 0) {
      await this.sleep(delay)
    }
    this.lastAcquired = this.now()
  }
}
