import type { Milliseconds } from "./time"

/**
 * Wall-clock reads. TTL deadlines in the memory store and stage timings in the
 * logging hook are computed from `nowMs()`.
 */
export type TimeSource = {
  now(): Date
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Waits `ms` milliseconds; used between upsert attempts.
   *
   * @remarks
   * Resolves (never rejects) as soon as `signal` aborts. Callers check the
   * signal afterwards to tell a completed wait from a cancelled one.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
