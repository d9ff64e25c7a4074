import { logLevelNames } from "@stowaway/logger"
import { z } from "zod"
import { compressionNames } from "../adapters/compressors/zlib-compressors"

export const envSchema = z.object({
  SERVICE_NAME: z.string().default("stowaway"),

  REDIS_URL: z.url({ protocol: /^rediss?$/ }).default("redis://localhost:6379"),
  REDIS_KEY_PREFIX: z.string().default(""),

  CACHE_BATCH_SIZE: z.coerce.number().int().nonnegative().default(0),
  CACHE_NEAR_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(0),
  CACHE_COMPRESSION: z.enum(compressionNames).default("none"),

  CACHE_UPSERT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  CACHE_UPSERT_BACKOFF_BASE_MS: z.coerce.number().nonnegative().default(10),
  CACHE_UPSERT_BACKOFF_MAX_MS: z.coerce.number().nonnegative().default(500),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>
