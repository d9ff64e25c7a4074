import type { StoreKey } from "./store-key"
import type { StoreCallOptions, StoreSetOptions } from "./store-options"
import type {
  StoreCasResult,
  StoreResult,
  StoreTtl,
  StoreWriteResult,
} from "./store-result"
import type { Milliseconds } from "./time"

export type StoreEntry = readonly [StoreKey, Uint8Array]

/**
 * BytesStore is the remote key-value store a cache sits in front of.
 *
 * @remarks
 * - Values are opaque byte payloads; adapters never interpret them.
 * - Absence is reported as `not_found`, never as an error.
 * - Failures of the transport or server are thrown as-is; callers classify them.
 */
export interface BytesStore {
  /**
   * Retrieve the payload stored under `key`.
   */
  get(key: StoreKey, opts?: StoreCallOptions): Promise<StoreResult>

  /**
   * Retrieve several payloads in one round trip.
   *
   * @remarks
   * - The result is positional: `result[i]` belongs to `keys[i]`.
   * - Duplicate keys are allowed and each gets its own slot.
   * - Adapters must not split the request; batching is the caller's policy.
   */
  getMany(keys: readonly StoreKey[], opts?: StoreCallOptions): Promise<StoreResult[]>

  /**
   * Store a payload unconditionally.
   */
  set(key: StoreKey, value: Uint8Array, opts?: StoreSetOptions): Promise<void>

  /**
   * Store several payloads. All entries share the same options.
   */
  setMany(entries: readonly StoreEntry[], opts?: StoreSetOptions): Promise<void>

  /**
   * Store a payload only if the key does not exist. Atomic.
   */
  setIfAbsent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult>

  /**
   * Store a payload only if the key already exists. Atomic.
   */
  setIfPresent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult>

  /**
   * Store `value` only if the current payload is byte-for-byte equal to
   * `expected`, or, when `expected` is `null`, only if the key is absent.
   *
   * @remarks
   * Adapters must evaluate the comparison and the write as one indivisible
   * server-side operation (e.g. a Lua script). Emulating it with a read
   * followed by a write is not safe.
   */
  compareAndSet(
    key: StoreKey,
    expected: Uint8Array | null,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreCasResult>

  /**
   * Delete an entry. Deleting an absent key is a no-op.
   */
  delete(key: StoreKey, opts?: StoreCallOptions): Promise<void>

  has(key: StoreKey, opts?: StoreCallOptions): Promise<boolean>

  /**
   * Remaining time to live of an entry.
   */
  ttl(key: StoreKey, opts?: StoreCallOptions): Promise<StoreTtl>

  /**
   * Set a new time to live on an existing entry.
   *
   * @returns `false` when the key does not exist.
   */
  expire(key: StoreKey, ttlMs: Milliseconds, opts?: StoreCallOptions): Promise<boolean>

  /**
   * Remove the time to live of an entry, keeping its value.
   *
   * @returns `false` when the key does not exist.
   */
  persist(key: StoreKey, opts?: StoreCallOptions): Promise<boolean>

  /**
   * Round trip to the store without touching data.
   */
  ping(opts?: StoreCallOptions): Promise<void>
}
