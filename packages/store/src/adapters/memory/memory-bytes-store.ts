import { SystemClock } from "../clock/system-clock"
import { bytesEqual } from "../../core/bytes"
import type { BytesStore, StoreEntry } from "../../ports/bytes-store"
import type { Clock } from "../../ports/clock"
import type { StoreKey } from "../../ports/store-key"
import type { StoreCallOptions, StoreSetOptions } from "../../ports/store-options"
import type {
  StoreCasResult,
  StoreResult,
  StoreTtl,
  StoreWriteResult,
} from "../../ports/store-result"
import type { Milliseconds } from "../../ports/time"

type MemoryEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

export type MemoryStoreDeps = {
  clock: Clock
}

export type MemoryStoreOptions = {
  maxEntries?: number
}

/**
 * In-process BytesStore.
 *
 * @remarks
 * - Every operation is synchronous under the hood, so conditional writes are atomic.
 * - Expired entries are removed lazily on access.
 * - Stored and returned payloads are copies; callers may mutate their buffers freely.
 */
export class MemoryBytesStore implements BytesStore {
  private readonly store = new Map<StoreKey, MemoryEntry>()

  public constructor(
    private readonly deps: MemoryStoreDeps,
    private readonly opts: MemoryStoreOptions = {},
  ) {}

  async get(key: StoreKey, opts?: StoreCallOptions): Promise<StoreResult> {
    opts?.signal?.throwIfAborted()

    return this.read(key)
  }

  async getMany(keys: readonly StoreKey[], opts?: StoreCallOptions): Promise<StoreResult[]> {
    opts?.signal?.throwIfAborted()

    return keys.map((key) => this.read(key))
  }

  async set(key: StoreKey, value: Uint8Array, opts?: StoreSetOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    this.write(key, value, opts?.ttlMs)
  }

  async setMany(entries: readonly StoreEntry[], opts?: StoreSetOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    for (const [key, value] of entries) this.write(key, value, opts?.ttlMs)
  }

  async setIfAbsent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult> {
    opts?.signal?.throwIfAborted()

    if (this.getLiveEntry(key)) return { kind: "skipped" }

    this.write(key, value, opts?.ttlMs)
    return { kind: "written" }
  }

  async setIfPresent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult> {
    opts?.signal?.throwIfAborted()

    if (!this.getLiveEntry(key)) return { kind: "skipped" }

    this.write(key, value, opts?.ttlMs)
    return { kind: "written" }
  }

  async compareAndSet(
    key: StoreKey,
    expected: Uint8Array | null,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreCasResult> {
    opts?.signal?.throwIfAborted()

    const entry = this.getLiveEntry(key)

    if (expected === null) {
      if (entry) return { kind: "conflict" }
    } else if (!entry || !bytesEqual(entry.value, expected)) {
      return { kind: "conflict" }
    }

    this.write(key, value, opts?.ttlMs)
    return { kind: "written" }
  }

  async delete(key: StoreKey, opts?: StoreCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    this.store.delete(key)
  }

  async has(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted()

    return this.getLiveEntry(key) !== undefined
  }

  async ttl(key: StoreKey, opts?: StoreCallOptions): Promise<StoreTtl> {
    opts?.signal?.throwIfAborted()

    const entry = this.getLiveEntry(key)
    if (!entry) return { kind: "not_found" }
    if (entry.expiresAtMs === undefined) return { kind: "persistent" }

    return { kind: "expiring", milliseconds: entry.expiresAtMs - this.deps.clock.nowMs() }
  }

  async expire(key: StoreKey, ttlMs: Milliseconds, opts?: StoreCallOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted()

    const entry = this.getLiveEntry(key)
    if (!entry) return false

    if (ttlMs <= 0) {
      this.store.delete(key)
      return true
    }

    entry.expiresAtMs = this.deps.clock.nowMs() + ttlMs
    return true
  }

  async persist(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted()

    const entry = this.getLiveEntry(key)
    if (!entry) return false

    entry.expiresAtMs = undefined
    return true
  }

  async ping(opts?: StoreCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()
  }

  private read(key: StoreKey): StoreResult {
    const entry = this.getLiveEntry(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(entry.value) }
  }

  private write(key: StoreKey, value: Uint8Array, ttlMs: Milliseconds | undefined): void {
    this.enforceMaxEntries(key)

    const expiresAtMs = this.computeExpiresAt(ttlMs)

    this.store.set(key, {
      value: new Uint8Array(value),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  private getLiveEntry(key: StoreKey): MemoryEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private enforceMaxEntries(key: StoreKey): void {
    if (this.opts.maxEntries === undefined) return
    if (this.getLiveEntry(key)) return

    this.purgeExpired()

    if (this.store.size >= this.opts.maxEntries) {
      throw new Error(`MemoryBytesStore: max entries (${this.opts.maxEntries}) exceeded`)
    }
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) this.store.delete(key)
    }
  }

  private isExpired(entry: MemoryEntry): boolean {
    if (entry.expiresAtMs === undefined) return false
    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }

  private computeExpiresAt(ttlMs: Milliseconds | undefined): Milliseconds | undefined {
    if (ttlMs === undefined || ttlMs <= 0) return undefined
    return this.deps.clock.nowMs() + ttlMs
  }
}

export function createMemoryBytesStore(
  deps: Partial<MemoryStoreDeps> = {},
  opts: MemoryStoreOptions = {},
): MemoryBytesStore {
  return new MemoryBytesStore({ clock: deps.clock ?? new SystemClock() }, opts)
}
