import { CacheError, type CacheErrorContext } from "./cache-error"

type ErrorInit = Readonly<{
  context?: CacheErrorContext
  cause?: unknown
}>

/**
 * The key is absent. An expected outcome of `get`, not a failure.
 */
export class KeyNotFoundError extends CacheError<"key_not_found"> {
  constructor(key: string, init: ErrorInit = {}) {
    super(`key not found: ${key}`, {
      code: "key_not_found",
      context: { ...init.context, key },
    })
  }
}

/**
 * A value could not be turned into bytes (encode or compress stage).
 */
export class EncodeError extends CacheError<"encode_failed"> {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { code: "encode_failed", isOperational: false, ...init })
  }
}

type DecodeErrorCode = "decode_failed" | "data_corruption"

/**
 * Bytes could not be turned back into a value.
 */
export class DecodeError extends CacheError<DecodeErrorCode> {
  constructor(message: string, init: ErrorInit & { code?: DecodeErrorCode } = {}) {
    const { code = "decode_failed", ...rest } = init
    super(message, { code, ...rest })
  }
}

/**
 * Stored bytes failed to decompress or decode.
 */
export class DataCorruptionError extends DecodeError {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { ...init, code: "data_corruption" })
  }
}

/**
 * The backing store failed. The original failure is the `cause`.
 */
export class StoreError extends CacheError<"store_failed"> {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { code: "store_failed", isRetryable: true, ...init })
  }
}

/**
 * A conditional write lost a race. Re-running the whole read-modify-write may succeed.
 */
export class RetryableConflictError extends CacheError<"retryable_conflict"> {
  constructor(key: string, init: ErrorInit = {}) {
    super(`conflicting write on key: ${key}`, {
      code: "retryable_conflict",
      isRetryable: true,
      context: { ...init.context, key },
      ...(init.cause !== undefined && { cause: init.cause }),
    })
  }
}

export class CancelledError extends CacheError<"cancelled"> {
  constructor(message = "operation cancelled", init: ErrorInit = {}) {
    super(message, { code: "cancelled", ...init })
  }
}

export class ConfigError extends CacheError<"invalid_config"> {
  constructor(message: string, init: ErrorInit = {}) {
    super(message, { code: "invalid_config", isOperational: false, ...init })
  }
}
