import { z } from "zod"
import { ConfigError } from "../errors/errors"
import type { CacheConfig } from "./cache-config"
import { type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): CacheConfig {
  return {
    redis: {
      url: env.REDIS_URL,
      keyspacePrefix: env.REDIS_KEY_PREFIX,
      nearCacheTtlMs: env.CACHE_NEAR_CACHE_TTL_MS,
    },
    cache: {
      batchSize: env.CACHE_BATCH_SIZE,
      compression: env.CACHE_COMPRESSION,
      upsert: {
        maxAttempts: env.CACHE_UPSERT_MAX_ATTEMPTS,
        backoffBaseMs: env.CACHE_UPSERT_BACKOFF_BASE_MS,
        backoffMaxMs: env.CACHE_UPSERT_BACKOFF_MAX_MS,
      },
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Parses cache settings from environment variables.
 *
 * @throws ConfigError when a variable is present but invalid.
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }

  if (result.data.CACHE_UPSERT_BACKOFF_MAX_MS < result.data.CACHE_UPSERT_BACKOFF_BASE_MS) {
    throw new ConfigError(
      "Configuration validation failed:\nCACHE_UPSERT_BACKOFF_MAX_MS must be >= CACHE_UPSERT_BACKOFF_BASE_MS",
    )
  }

  return Object.freeze(mapEnvToConfig(result.data))
}
