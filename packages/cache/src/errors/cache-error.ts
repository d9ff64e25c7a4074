import type { PipelineStage } from "../ports/hook"

export type CacheErrorCode =
  | "key_not_found"
  | "encode_failed"
  | "decode_failed"
  | "data_corruption"
  | "store_failed"
  | "retryable_conflict"
  | "cancelled"
  | "invalid_config"

export type CacheOperation =
  | "get"
  | "set"
  | "delete"
  | "mget"
  | "mset"
  | "set_if_absent"
  | "set_if_present"
  | "has"
  | "ttl"
  | "expire"
  | "ping"
  | "upsert"

/**
 * Where a failure happened. Every field is optional; errors carry what they know.
 */
export type CacheErrorContext = Readonly<
  {
    operation?: CacheOperation
    key?: string
    stage?: PipelineStage
  } & Record<string, unknown>
>

export type CacheErrorOptions<C extends CacheErrorCode = CacheErrorCode> = Readonly<{
  code: C
  context?: CacheErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * JSON-safe shape of a cache error, for logs and transport.
 */
export type SerializedCacheError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedCacheError
}>

export class CacheError<C extends CacheErrorCode = CacheErrorCode> extends Error {
  readonly code: C
  readonly context: CacheErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CacheErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedCacheError {
    return serializeCacheError(this)
  }
}

/**
 * Serialize any thrown value to a consistent shape, following the `cause` chain.
 */
export function serializeCacheError(err: unknown): SerializedCacheError {
  if (err instanceof CacheError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

/**
 * Type guard for cache errors, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   await cache.upsert(key, bump)
 * } catch (err) {
 *   if (isCacheError(err, "retryable_conflict")) return scheduleRetry()
 *   throw err
 * }
 * ```
 */
export function isCacheError<C extends CacheErrorCode>(
  err: unknown,
  code?: C,
): err is CacheError<C> {
  if (!(err instanceof CacheError)) return false
  return code === undefined || err.code === code
}
