import { createNullLogger, type Logger } from "@stowaway/logger"
import { type BytesStore, type Clock, type StoreEntry, SystemClock } from "@stowaway/store"
import { KeyNotFoundError } from "../errors/errors"
import type { Cache, CacheEntry } from "../ports/cache"
import type { CacheKey } from "../ports/cache-key"
import type {
  CacheCallOptions,
  CacheGetManyOptions,
  CacheSetManyOptions,
  CacheSetOptions,
  CacheTtl,
  CacheUpsertOptions,
} from "../ports/cache-options"
import type { CacheGetManyOutcome, CacheTtlState } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { Compressor } from "../ports/compressor"
import type { DelayPolicy } from "../ports/delay-policy"
import type { Hook } from "../ports/hook"
import type { UpsertFn, UpsertResult } from "../ports/upsert"
import { assertBatchSize, chunks } from "./chunks"
import { getMany } from "./get-many/get-many"
import { CodecPipeline } from "./pipeline/codec-pipeline"
import { storeCall } from "./store-call"
import { toTtlMs } from "./ttl"
import { noBackoff } from "./upsert/backoff"
import { upsert, type UpsertPolicy } from "./upsert/upsert"

export type CodecCacheDeps<T> = {
  store: BytesStore
  codec: Codec<T>
  compressor?: Compressor
  clock?: Clock
  logger?: Logger
}

export type CodecCacheOptions = {
  /**
   * Maximum number of keys per store round trip in `getMany` / `setMany`.
   * `0` (the default) sends everything at once.
   */
  batchSize?: number

  /** Outermost first. */
  hooks?: readonly Hook[]

  upsert?: {
    /** Default: 1 (conflicts are surfaced to the caller). */
    maxAttempts?: number
    /** Default: no delay between attempts. */
    backoff?: DelayPolicy
  }
}

function assertMaxAttempts(n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${n})`)
  }
}

export class CodecCache<T> implements Cache<T> {
  private pipeline: CodecPipeline<T>
  private readonly store: BytesStore
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly batchSize: number
  private readonly upsertPolicy: UpsertPolicy

  public constructor(deps: CodecCacheDeps<T>, opts: CodecCacheOptions = {}) {
    this.batchSize = opts.batchSize ?? 0
    assertBatchSize(this.batchSize)

    const maxAttempts = opts.upsert?.maxAttempts ?? 1
    assertMaxAttempts(maxAttempts)

    this.upsertPolicy = { maxAttempts, backoff: opts.upsert?.backoff ?? noBackoff }
    this.store = deps.store
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "cache" })
    this.pipeline = new CodecPipeline(
      {
        codec: deps.codec,
        ...(deps.compressor !== undefined && { compressor: deps.compressor }),
      },
      opts.hooks ?? [],
    )
  }

  addHook(hook: Hook): void {
    this.pipeline = this.pipeline.withHook(hook)
  }

  async set(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<void> {
    const ttlMs = toTtlMs(opts?.ttl)
    const bytes = this.pipeline.toBytes(value, { operation: "set", key })
    const signal = opts?.signal

    await storeCall(() => this.store.set(key, bytes, { ttlMs, signal }), {
      operation: "set",
      key,
      signal,
    })
  }

  async get(key: CacheKey, opts?: CacheCallOptions): Promise<T> {
    const signal = opts?.signal
    const res = await storeCall(() => this.store.get(key, { signal }), {
      operation: "get",
      key,
      signal,
    })

    if (res.kind === "not_found") {
      throw new KeyNotFoundError(key, { context: { operation: "get" } })
    }

    return this.pipeline.fromBytes(res.value, { operation: "get", key })
  }

  async delete(key: CacheKey, opts?: CacheCallOptions): Promise<void> {
    const signal = opts?.signal

    await storeCall(() => this.store.delete(key, { signal }), {
      operation: "delete",
      key,
      signal,
    })
  }

  async getMany(
    keys: readonly CacheKey[],
    opts?: CacheGetManyOptions,
  ): Promise<CacheGetManyOutcome<T>[]> {
    const batchSize = opts?.batchSize ?? this.batchSize
    assertBatchSize(batchSize)

    return getMany(
      { store: this.store, pipeline: this.pipeline, logger: this.logger },
      keys,
      { batchSize, signal: opts?.signal },
    )
  }

  async setMany(entries: readonly CacheEntry<T>[], opts?: CacheSetManyOptions): Promise<void> {
    const batchSize = opts?.batchSize ?? this.batchSize
    assertBatchSize(batchSize)

    const ttlMs = toTtlMs(opts?.ttl)
    const signal = opts?.signal

    // Encode everything up front so a bad value fails the call before any write.
    const encoded: StoreEntry[] = entries.map(([key, value]) => [
      key,
      this.pipeline.toBytes(value, { operation: "mset", key }),
    ])

    for (const batch of chunks(encoded, batchSize)) {
      await storeCall(() => this.store.setMany(batch, { ttlMs, signal }), {
        operation: "mset",
        keyCount: batch.length,
        signal,
      })
    }
  }

  async setIfAbsent(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean> {
    const ttlMs = toTtlMs(opts?.ttl)
    const bytes = this.pipeline.toBytes(value, { operation: "set_if_absent", key })
    const signal = opts?.signal

    const res = await storeCall(() => this.store.setIfAbsent(key, bytes, { ttlMs, signal }), {
      operation: "set_if_absent",
      key,
      signal,
    })

    return res.kind === "written"
  }

  async setIfPresent(key: CacheKey, value: T, opts?: CacheSetOptions): Promise<boolean> {
    const ttlMs = toTtlMs(opts?.ttl)
    const bytes = this.pipeline.toBytes(value, { operation: "set_if_present", key })
    const signal = opts?.signal

    const res = await storeCall(() => this.store.setIfPresent(key, bytes, { ttlMs, signal }), {
      operation: "set_if_present",
      key,
      signal,
    })

    return res.kind === "written"
  }

  async has(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    const signal = opts?.signal

    return storeCall(() => this.store.has(key, { signal }), { operation: "has", key, signal })
  }

  async ttl(key: CacheKey, opts?: CacheCallOptions): Promise<CacheTtlState> {
    const signal = opts?.signal

    return storeCall(() => this.store.ttl(key, { signal }), { operation: "ttl", key, signal })
  }

  /**
   * A zero ttl removes the expiry, matching `set`; the value is kept.
   */
  async expire(key: CacheKey, ttl: CacheTtl, opts?: CacheCallOptions): Promise<boolean> {
    const ttlMs = toTtlMs(ttl)
    const signal = opts?.signal

    return storeCall(
      () =>
        ttlMs === undefined
          ? this.store.persist(key, { signal })
          : this.store.expire(key, ttlMs, { signal }),
      { operation: "expire", key, signal },
    )
  }

  async upsert(
    key: CacheKey,
    update: UpsertFn<T>,
    opts?: CacheUpsertOptions,
  ): Promise<UpsertResult<T>> {
    const maxAttempts = opts?.maxAttempts ?? this.upsertPolicy.maxAttempts
    assertMaxAttempts(maxAttempts)

    return upsert(
      { store: this.store, pipeline: this.pipeline, clock: this.clock, logger: this.logger },
      key,
      update,
      { ...this.upsertPolicy, maxAttempts },
      { ttlMs: toTtlMs(opts?.ttl), signal: opts?.signal },
    )
  }

  async healthy(opts?: CacheCallOptions): Promise<boolean> {
    const signal = opts?.signal

    try {
      await storeCall(() => this.store.ping({ signal }), { operation: "ping", signal })
      return true
    } catch (err) {
      this.logger.warn("cache store is unhealthy", { operation: "ping", err })
      return false
    }
  }
}

export function createCache<T>(deps: CodecCacheDeps<T>, opts: CodecCacheOptions = {}): Cache<T> {
  return new CodecCache(deps, opts)
}
