import type { DecodeError } from "../errors/errors"
import type { CacheKey } from "./cache-key"
import type { Milliseconds } from "./time"

export type CacheFound<T> = {
  readonly kind: "found"
  readonly key: CacheKey
  readonly value: T
}

export type CacheNotFound = {
  readonly kind: "not_found"
  readonly key: CacheKey
}

/**
 * The entry exists but its bytes could not be decoded.
 */
export type CacheDecodeFailure = {
  readonly kind: "error"
  readonly key: CacheKey
  readonly error: DecodeError
}

/**
 * Per-key outcome of `getMany`, in the order the keys were requested.
 */
export type CacheGetManyOutcome<T> = CacheFound<T> | CacheNotFound | CacheDecodeFailure

export type CacheTtlState =
  | { readonly kind: "not_found" }
  | { readonly kind: "persistent" }
  | { readonly kind: "expiring"; readonly milliseconds: Milliseconds }
