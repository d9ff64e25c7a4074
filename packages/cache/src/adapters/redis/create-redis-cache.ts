import { createPinoLogger, type Logger } from "@stowaway/logger"
import {
  createNearCache,
  createRedisBytesStore,
  createRedisClient,
  type RedisBytesClient,
  type RedisNearCache,
  SystemClock,
} from "@stowaway/store"
import type { CacheConfig } from "../../config/cache-config"
import { CodecCache } from "../../core/codec-cache"
import { exponentialBackoff } from "../../core/upsert/backoff"
import type { Cache } from "../../ports/cache"
import type { Codec } from "../../ports/codec"
import type { Hook } from "../../ports/hook"
import { compressorFor } from "../compressors/zlib-compressors"

export type CreateRedisCacheOptions<T> = {
  config: CacheConfig
  codec: Codec<T>
  /** Defaults to a pino logger built from `config.logging`. */
  logger?: Logger
  hooks?: readonly Hook[]
}

export type RedisCacheBundle<T> = {
  cache: Cache<T>
  client: RedisBytesClient
  /** Present when `config.redis.nearCacheTtlMs > 0`; its `stats()` feed telemetry. */
  nearCache?: RedisNearCache
}

/**
 * Wires a Redis-backed cache from configuration.
 *
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisCache<T>(options: CreateRedisCacheOptions<T>): RedisCacheBundle<T> {
  const { config, codec } = options

  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const nearCache =
    config.redis.nearCacheTtlMs > 0
      ? createNearCache({ ttlMs: config.redis.nearCacheTtlMs })
      : undefined

  const client = createRedisClient({
    url: config.redis.url,
    ...(nearCache !== undefined && { nearCache }),
  })

  const store = createRedisBytesStore({
    client,
    opts: { keyspacePrefix: config.redis.keyspacePrefix },
  })

  const compressor = compressorFor(config.cache.compression)

  const cache = new CodecCache<T>(
    {
      store,
      codec,
      clock: new SystemClock(),
      logger,
      ...(compressor !== undefined && { compressor }),
    },
    {
      batchSize: config.cache.batchSize,
      hooks: options.hooks ?? [],
      upsert: {
        maxAttempts: config.cache.upsert.maxAttempts,
        backoff: exponentialBackoff({
          baseMs: config.cache.upsert.backoffBaseMs,
          maxMs: config.cache.upsert.backoffMaxMs,
        }),
      },
    },
  )

  return { cache, client, ...(nearCache !== undefined && { nearCache }) }
}
