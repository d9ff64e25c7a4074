export { bytesCodec } from "./adapters/codecs/bytes-codec"
export { jsonCodec } from "./adapters/codecs/json-codec"
export { stringCodec } from "./adapters/codecs/string-codec"
export {
  brotliCompressor,
  type CompressionName,
  compressionNames,
  compressorFor,
  deflateCompressor,
  gzipCompressor,
} from "./adapters/compressors/zlib-compressors"
export { createLoggingHook, type LoggingHookDeps } from "./adapters/hooks/logging-hook"
export {
  createRedisCache,
  type CreateRedisCacheOptions,
  type RedisCacheBundle,
} from "./adapters/redis/create-redis-cache"
export type { CacheConfig } from "./config/cache-config"
export { loadCacheConfig, mapEnvToConfig } from "./config/load-cache-config"
export { type EnvConfig, envSchema } from "./config/schema"
export {
  CodecCache,
  type CodecCacheDeps,
  type CodecCacheOptions,
  createCache,
} from "./core/codec-cache"
export { CodecPipeline, type PipelineCallContext } from "./core/pipeline/codec-pipeline"
export { ttl } from "./core/ttl"
export {
  type ExponentialBackoffOptions,
  exponentialBackoff,
  noBackoff,
} from "./core/upsert/backoff"
export {
  CacheError,
  type CacheErrorCode,
  type CacheErrorContext,
  type CacheOperation,
  isCacheError,
  type SerializedCacheError,
  serializeCacheError,
} from "./errors/cache-error"
export {
  CancelledError,
  ConfigError,
  DataCorruptionError,
  DecodeError,
  EncodeError,
  KeyNotFoundError,
  RetryableConflictError,
  StoreError,
} from "./errors/errors"
export type { Cache, CacheEntry } from "./ports/cache"
export type { CacheKey } from "./ports/cache-key"
export type {
  CacheCallOptions,
  CacheGetManyOptions,
  CacheSetManyOptions,
  CacheSetOptions,
  CacheTtl,
  CacheUpsertOptions,
} from "./ports/cache-options"
export type {
  CacheDecodeFailure,
  CacheFound,
  CacheGetManyOutcome,
  CacheNotFound,
  CacheTtlState,
} from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { Compressor } from "./ports/compressor"
export type { DelayPolicy } from "./ports/delay-policy"
export type {
  BytesFn,
  DecodeFn,
  EncodeFn,
  Hook,
  HookKind,
  PipelineStage,
} from "./ports/hook"
export type { Seconds } from "./ports/time"
export type { UpsertDecision, UpsertFn, UpsertPrior, UpsertResult } from "./ports/upsert"
