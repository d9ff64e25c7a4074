import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

/**
 * A zero TTL means "no expiry", the same as passing none.
 */
export type CacheTtl = SecondsTtl | MillisecondsTtl

export type CacheCallOptions = {
  /**
   * Aborts the in-flight store round trip. The call then rejects with `CancelledError`.
   */
  signal?: AbortSignal
}

export type CacheSetOptions = CacheCallOptions & {
  ttl?: CacheTtl
}

export type CacheGetManyOptions = CacheCallOptions & {
  /**
   * Overrides the cache's batch size for this call. `0` means a single round trip.
   */
  batchSize?: number
}

export type CacheSetManyOptions = CacheSetOptions & {
  batchSize?: number
}

export type CacheUpsertOptions = CacheSetOptions & {
  /**
   * Overrides the cache's attempt budget for this call. `1` surfaces the first
   * conflict to the caller.
   */
  maxAttempts?: number
}
