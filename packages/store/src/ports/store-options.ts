import type { Milliseconds } from "./time"

export type StoreCallOptions = {
  /**
   * Aborts the in-flight round trip.
   *
   * @remarks
   * Adapters reject with the signal's reason (an `AbortError` by default).
   */
  readonly signal?: AbortSignal
}

export type StoreSetOptions = StoreCallOptions & {
  /**
   * Time to live of the written entry. `undefined` or `0` stores the entry
   * without expiry, clearing any TTL a previous write left behind.
   */
  readonly ttlMs?: Milliseconds
}
