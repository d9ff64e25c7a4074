import type { CacheKey } from "./cache-key"
import type {
  CacheCallOptions,
  CacheGetManyOptions,
  CacheSetManyOptions,
  CacheSetOptions,
  CacheTtl,
  CacheUpsertOptions,
} from "./cache-options"
import type { CacheGetManyOutcome, CacheTtlState } from "./cache-result"
import type { Hook } from "./hook"
import type { UpsertFn, UpsertResult } from "./upsert"

export type CacheEntry<T> = readonly [CacheKey, T]

/**
 * Typed cache in front of a byte store.
 *
 * @remarks
 * Failures reject with a `CacheError` subclass:
 * - `KeyNotFoundError` from `get` when the key is absent
 * - `EncodeError` / `DataCorruptionError` from the codec pipeline
 * - `StoreError` when the store fails, `CancelledError` when the signal aborts
 * - `RetryableConflictError` from `upsert` once its attempts are used up
 */
export interface Cache<T> {
  set(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<void>

  get(key: CacheKey, opts?: CacheCallOptions): Promise<T>

  /**
   * Idempotent.
   */
  delete(key: CacheKey, opts?: CacheCallOptions): Promise<void>

  /**
   * Reads many keys in contiguous batches. A decode failure is reported for its
   * key only; a store failure rejects the whole call.
   */
  getMany(keys: readonly CacheKey[], opts?: CacheGetManyOptions): Promise<CacheGetManyOutcome<T>[]>

  setMany(entries: readonly CacheEntry<T>[], opts?: CacheSetManyOptions): Promise<void>

  /**
   * @returns `true` when the value was written.
   */
  setIfAbsent(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean>

  /**
   * @returns `true` when the value was written.
   */
  setIfPresent(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean>

  has(key: CacheKey, opts?: CacheCallOptions): Promise<boolean>

  ttl(key: CacheKey, opts?: CacheCallOptions): Promise<CacheTtlState>

  /**
   * Replace the ttl of an existing entry. A zero ttl makes it persistent.
   *
   * @returns `false` when the key does not exist.
   */
  expire(key: CacheKey, ttl: CacheTtl, opts?: CacheCallOptions): Promise<boolean>

  /**
   * Atomic read-modify-write. The write only lands if the stored bytes are still
   * the ones `update` was computed from.
   */
  upsert(key: CacheKey, update: UpsertFn<T>, opts?: CacheUpsertOptions): Promise<UpsertResult<T>>

  /**
   * Round trip to the store. Resolves `false` (and logs) when it fails.
   */
  healthy(opts?: CacheCallOptions): Promise<boolean>

  /**
   * Appends a hook. It becomes the innermost wrapper of every stage.
   */
  addHook(hook: Hook): void
}
