import { setTimeout as delay } from "node:timers/promises"
import type { Clock } from "../../ports/clock"
import type { Milliseconds } from "../../ports/time"

/**
 * Wall clock backed by `Date` and Node's promise timers.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  /**
   * Abort settles the wait instead of rejecting it; the caller inspects the
   * signal to see which happened.
   */
  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    try {
      await delay(ms, undefined, { signal })
    } catch (err) {
      if (signal?.aborted) return
      throw err
    }
  }
}
