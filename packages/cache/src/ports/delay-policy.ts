import type { Milliseconds } from "./time"

/**
 * Delay before the next attempt. `attempt` is zero-based: 0 is the delay after
 * the first failed attempt.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Milliseconds
}
