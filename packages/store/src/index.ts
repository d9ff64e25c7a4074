export { SystemClock } from "./adapters/clock/system-clock"
export { FakeClock } from "./adapters/clock/fake-clock"
export {
  createMemoryBytesStore,
  MemoryBytesStore,
  type MemoryStoreDeps,
  type MemoryStoreOptions,
} from "./adapters/memory/memory-bytes-store"
export {
  createNearCache,
  createRedisBytesStore,
  createRedisClient,
  type RedisBytesClientOptions,
  type RedisBytesStoreBundleOptions,
  type RedisNearCache,
  type RedisNearCacheOptions,
} from "./adapters/redis/create"
export {
  RedisBytesStore,
  type RedisStoreDeps,
  type RedisStoreOptions,
} from "./adapters/redis/redis-bytes-store"
export type { RedisBytesClient } from "./adapters/redis/redis-client"
export { bytesEqual } from "./core/bytes"
export type { BytesStore, StoreEntry } from "./ports/bytes-store"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { StoreKey } from "./ports/store-key"
export type { StoreCallOptions, StoreSetOptions } from "./ports/store-options"
export type {
  StoreCasResult,
  StoreFound,
  StoreNotFound,
  StoreResult,
  StoreTtl,
  StoreWriteResult,
} from "./ports/store-result"
export type { Milliseconds } from "./ports/time"
