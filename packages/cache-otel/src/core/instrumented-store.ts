import type { Attributes, Counter, Histogram } from "@opentelemetry/api"
import type {
  BytesStore,
  Milliseconds,
  StoreCallOptions,
  StoreCasResult,
  StoreEntry,
  StoreKey,
  StoreResult,
  StoreSetOptions,
  StoreTtl,
  StoreWriteResult,
} from "@stowaway/store"
import type { TelemetryOptions } from "../ports/options"
import { resolveConfig, type TelemetryConfig } from "./config"

/**
 * BytesStore decorator recording one duration sample per command, an error count
 * per failed command, and hit/miss counts for reads.
 */
export class InstrumentedStore implements BytesStore {
  private readonly duration: Histogram
  private readonly errors: Counter
  private readonly hits: Counter
  private readonly misses: Counter
  private readonly attributes: Attributes

  public constructor(
    private readonly inner: BytesStore,
    config: TelemetryConfig,
  ) {
    const { meter } = config
    this.attributes = config.attributes

    this.duration = meter.createHistogram("cache.store.command.duration", {
      description: "Duration of backing store commands",
      unit: "s",
      advice: { explicitBucketBoundaries: config.buckets },
    })
    this.errors = meter.createCounter("cache.store.command.errors", {
      description: "Count of failed backing store commands",
    })
    this.hits = meter.createCounter("cache.store.hits", {
      description: "Count of keys found by reads",
    })
    this.misses = meter.createCounter("cache.store.misses", {
      description: "Count of keys missing on reads",
    })
  }

  async get(key: StoreKey, opts?: StoreCallOptions): Promise<StoreResult> {
    const res = await this.record("get", () => this.inner.get(key, opts))
    this.countReads([res])
    return res
  }

  async getMany(keys: readonly StoreKey[], opts?: StoreCallOptions): Promise<StoreResult[]> {
    const res = await this.record("mget", () => this.inner.getMany(keys, opts))
    this.countReads(res)
    return res
  }

  set(key: StoreKey, value: Uint8Array, opts?: StoreSetOptions): Promise<void> {
    return this.record("set", () => this.inner.set(key, value, opts))
  }

  setMany(entries: readonly StoreEntry[], opts?: StoreSetOptions): Promise<void> {
    return this.record("mset", () => this.inner.setMany(entries, opts))
  }

  setIfAbsent(key: StoreKey, value: Uint8Array, opts?: StoreSetOptions): Promise<StoreWriteResult> {
    return this.record("set_if_absent", () => this.inner.setIfAbsent(key, value, opts))
  }

  setIfPresent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult> {
    return this.record("set_if_present", () => this.inner.setIfPresent(key, value, opts))
  }

  compareAndSet(
    key: StoreKey,
    expected: Uint8Array | null,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreCasResult> {
    return this.record("compare_and_set", () =>
      this.inner.compareAndSet(key, expected, value, opts),
    )
  }

  delete(key: StoreKey, opts?: StoreCallOptions): Promise<void> {
    return this.record("delete", () => this.inner.delete(key, opts))
  }

  has(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    return this.record("has", () => this.inner.has(key, opts))
  }

  ttl(key: StoreKey, opts?: StoreCallOptions): Promise<StoreTtl> {
    return this.record("ttl", () => this.inner.ttl(key, opts))
  }

  expire(key: StoreKey, ttlMs: Milliseconds, opts?: StoreCallOptions): Promise<boolean> {
    return this.record("expire", () => this.inner.expire(key, ttlMs, opts))
  }

  persist(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    return this.record("persist", () => this.inner.persist(key, opts))
  }

  ping(opts?: StoreCallOptions): Promise<void> {
    return this.record("ping", () => this.inner.ping(opts))
  }

  private async record<R>(command: string, call: () => Promise<R>): Promise<R> {
    const attrs: Attributes = { ...this.attributes, command }
    const start = performance.now()

    try {
      return await call()
    } catch (err) {
      this.errors.add(1, attrs)
      throw err
    } finally {
      this.duration.record((performance.now() - start) / 1000, attrs)
    }
  }

  private countReads(results: readonly StoreResult[]): void {
    let found = 0
    for (const r of results) if (r.kind === "found") found++

    const missing = results.length - found
    if (found > 0) this.hits.add(found, this.attributes)
    if (missing > 0) this.misses.add(missing, this.attributes)
  }
}

export function instrumentStore(store: BytesStore, opts: TelemetryOptions = {}): BytesStore {
  return new InstrumentedStore(store, resolveConfig(opts))
}
