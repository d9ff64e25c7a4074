import type { LogLevelName } from "@stowaway/logger"
import type { Milliseconds } from "@stowaway/store"
import type { CompressionName } from "../adapters/compressors/zlib-compressors"

export type CacheConfig = Readonly<{
  redis: Readonly<{
    url: string
    keyspacePrefix: string
    /** `0` disables the client-side near cache. */
    nearCacheTtlMs: Milliseconds
  }>
  cache: Readonly<{
    /** `0` means unbounded. */
    batchSize: number
    compression: CompressionName
    upsert: Readonly<{
      maxAttempts: number
      backoffBaseMs: Milliseconds
      backoffMaxMs: Milliseconds
    }>
  }>
  logging: Readonly<{
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }>
}>
