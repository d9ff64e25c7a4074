import {
  BasicClientSideCache,
  createClient,
  RESP_TYPES,
  type RedisClientOptions,
} from "redis"
import type { Milliseconds } from "../../ports/time"
import { RedisBytesStore, type RedisStoreOptions } from "./redis-bytes-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisNearCacheOptions = {
  /** Lifetime of a locally cached reply. `0` keeps entries until invalidated. */
  ttlMs: Milliseconds
  /** `0` means unbounded. */
  maxEntries?: number
}

/**
 * Process-local cache of read replies, kept coherent by Redis invalidation
 * messages. `stats()` reports its hits and misses.
 */
export type RedisNearCache = BasicClientSideCache

export function createNearCache(options: RedisNearCacheOptions): RedisNearCache {
  return new BasicClientSideCache({
    ttl: options.ttlMs,
    maxEntries: options.maxEntries ?? 0,
    evictPolicy: "LRU",
  })
}

export type RedisBytesClientOptions = { url: string } & Omit<
  RedisClientOptions,
  "url" | "RESP" | "clientSideCache"
> & {
    /**
     * Enables server-assisted client-side caching (RESP3 tracking). Reads of
     * hot keys are answered from process memory until Redis invalidates them.
     */
    nearCache?: RedisNearCache
  }

export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  const { nearCache, ...clientOptions } = options

  if (!nearCache) {
    return createClient({ ...clientOptions, url: options.url }).withTypeMapping({
      [RESP_TYPES.BLOB_STRING]: Buffer,
    }) as unknown as RedisBytesClient
  }

  return createClient({
    ...clientOptions,
    url: options.url,
    RESP: 3,
    clientSideCache: nearCache,
  }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

export type RedisBytesStoreBundleOptions = {
  client: RedisBytesClient
  opts?: RedisStoreOptions
}

/**
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisBytesStore(options: RedisBytesStoreBundleOptions): RedisBytesStore {
  return new RedisBytesStore({ client: options.client }, options.opts)
}
