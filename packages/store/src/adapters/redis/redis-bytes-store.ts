import { toBuffer } from "../../core/bytes"
import type { BytesStore, StoreEntry } from "../../ports/bytes-store"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { StoreKey } from "../../ports/store-key"
import type { StoreCallOptions, StoreSetOptions } from "../../ports/store-options"
import type {
  StoreCasResult,
  StoreResult,
  StoreTtl,
  StoreWriteResult,
} from "../../ports/store-result"
import type { Milliseconds } from "../../ports/time"
import type { RedisBytesClient, RedisSetOptions } from "./redis-client"

export type RedisStoreDeps = {
  client: RedisBytesClient
}

export type RedisStoreOptions = {
  /**
   * Prepended verbatim to every key. Use a trailing separator (`"app:users:"`).
   */
  keyspacePrefix?: KeyspacePrefix
}

/**
 * Redis implementation of BytesStore.
 *
 * @remarks
 * - `getMany` issues exactly one MGET; the cache layer owns batching.
 * - Writes without `ttlMs` use a plain SET, which clears any previous expiry.
 * - `compareAndSet` runs as a Lua script so the comparison and the write are atomic.
 * - Caller owns `client.connect()` / `client.quit()`.
 */
export class RedisBytesStore implements BytesStore {
  private readonly keyspacePrefix: KeyspacePrefix

  public constructor(
    private readonly deps: RedisStoreDeps,
    opts: RedisStoreOptions = {},
  ) {
    this.keyspacePrefix = opts.keyspacePrefix ?? ""
  }

  async get(key: StoreKey, opts?: StoreCallOptions): Promise<StoreResult> {
    const buffer = await this.client(opts).get(this.fullKey(key))

    return this.createResult(buffer)
  }

  async getMany(keys: readonly StoreKey[], opts?: StoreCallOptions): Promise<StoreResult[]> {
    if (keys.length === 0) return []

    const buffers = await this.client(opts).mGet(keys.map((k) => this.fullKey(k)))

    if (buffers.length !== keys.length) {
      throw new Error(`MGET returned ${buffers.length} replies for ${keys.length} keys`)
    }

    return buffers.map((buffer) => this.createResult(buffer))
  }

  async set(key: StoreKey, value: Uint8Array, opts?: StoreSetOptions): Promise<void> {
    await this.client(opts).set(this.fullKey(key), toBuffer(value), this.toSetOptions(opts))
  }

  async setMany(entries: readonly StoreEntry[], opts?: StoreSetOptions): Promise<void> {
    if (entries.length === 0) return

    const tx = this.client(opts).multi()
    const setOptions = this.toSetOptions(opts)

    for (const [key, value] of entries) {
      tx.set(this.fullKey(key), toBuffer(value), setOptions)
    }

    await tx.exec()
  }

  async setIfAbsent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult> {
    const reply = await this.client(opts).set(this.fullKey(key), toBuffer(value), {
      ...this.toSetOptions(opts),
      NX: true,
    })

    return reply === null ? { kind: "skipped" } : { kind: "written" }
  }

  async setIfPresent(
    key: StoreKey,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreWriteResult> {
    const reply = await this.client(opts).set(this.fullKey(key), toBuffer(value), {
      ...this.toSetOptions(opts),
      XX: true,
    })

    return reply === null ? { kind: "skipped" } : { kind: "written" }
  }

  async compareAndSet(
    key: StoreKey,
    expected: Uint8Array | null,
    value: Uint8Array,
    opts?: StoreSetOptions,
  ): Promise<StoreCasResult> {
    const reply = await this.client(opts).eval(this.compareAndSetScript(), {
      keys: [this.fullKey(key)],
      arguments: [
        expected === null ? "0" : "1",
        expected === null ? "" : toBuffer(expected),
        toBuffer(value),
        this.ttlArgument(opts?.ttlMs),
      ],
    })

    return reply === 1 ? { kind: "written" } : { kind: "conflict" }
  }

  async delete(key: StoreKey, opts?: StoreCallOptions): Promise<void> {
    await this.client(opts).del(this.fullKey(key))
  }

  async has(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    const exists = await this.client(opts).exists(this.fullKey(key))

    return exists === 1
  }

  async ttl(key: StoreKey, opts?: StoreCallOptions): Promise<StoreTtl> {
    const pttl = await this.client(opts).pTTL(this.fullKey(key))

    if (pttl === -2) return { kind: "not_found" }
    if (pttl === -1) return { kind: "persistent" }

    return { kind: "expiring", milliseconds: pttl }
  }

  async expire(key: StoreKey, ttlMs: Milliseconds, opts?: StoreCallOptions): Promise<boolean> {
    const reply = await this.client(opts).pExpire(this.fullKey(key), ttlMs)

    return reply === true || reply === 1
  }

  async persist(key: StoreKey, opts?: StoreCallOptions): Promise<boolean> {
    const client = this.client(opts)
    const fullKey = this.fullKey(key)

    // PERSIST answers 0 both for a missing key and for one without a ttl.
    if ((await client.persist(fullKey)) === 1) return true

    return (await client.exists(fullKey)) === 1
  }

  async ping(opts?: StoreCallOptions): Promise<void> {
    await this.client(opts).ping()
  }

  private client(opts: StoreCallOptions | undefined): RedisBytesClient {
    const signal = opts?.signal
    if (!signal) return this.deps.client

    signal.throwIfAborted()
    return this.deps.client.withAbortSignal(signal)
  }

  private compareAndSetScript(): string {
    return `
      -- KEYS[1] = value key
      -- ARGV[1] = '1' if a current value is expected, '0' if the key must be absent
      -- ARGV[2] = expected value (bytes)
      -- ARGV[3] = new value (bytes)
      -- ARGV[4] = ttlMs (empty => no expiry)

      local current = redis.call('GET', KEYS[1])

      if ARGV[1] == '1' then
        if not current or current ~= ARGV[2] then
          return 0
        end
      elseif current then
        return 0
      end

      if ARGV[4] ~= '' then
        redis.call('SET', KEYS[1], ARGV[3], 'PX', tonumber(ARGV[4]))
      else
        redis.call('SET', KEYS[1], ARGV[3])
      end

      return 1
    `
  }

  private toSetOptions(opts: StoreSetOptions | undefined): RedisSetOptions | undefined {
    const ttlMs = opts?.ttlMs
    if (ttlMs === undefined || ttlMs <= 0) return undefined

    return { PX: ttlMs }
  }

  private ttlArgument(ttlMs: Milliseconds | undefined): string {
    if (ttlMs === undefined || ttlMs <= 0) return ""
    return String(ttlMs)
  }

  private createResult(buffer: Buffer | null): StoreResult {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private fullKey(k: StoreKey): string {
    return `${this.keyspacePrefix}${k}`
  }
}
