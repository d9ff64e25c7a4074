import type { Clock } from "../../ports/clock"
import type { Milliseconds } from "../../ports/time"

/**
 * Manually driven clock for tests.
 *
 * @remarks
 * `sleep()` never waits; it advances time by the requested amount and records
 * the call so tests can assert on back-off delays.
 */
export class FakeClock implements Clock {
  readonly sleeps: Milliseconds[] = []
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, _signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms)
    this.advance(ms)
  }
}
