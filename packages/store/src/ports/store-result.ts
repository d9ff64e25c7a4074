import type { Milliseconds } from "./time"

export type StoreFound = {
  readonly kind: "found"
  readonly value: Uint8Array
}

export type StoreNotFound = {
  readonly kind: "not_found"
}

export type StoreResult = StoreFound | StoreNotFound

/**
 * Result of `setIfAbsent` / `setIfPresent`.
 */
export type StoreWriteResult = { readonly kind: "written" } | { readonly kind: "skipped" }

/**
 * Result of `compareAndSet`.
 */
export type StoreCasResult = { readonly kind: "written" } | { readonly kind: "conflict" }

export type StoreTtl =
  | { readonly kind: "not_found" }
  | { readonly kind: "persistent" }
  | { readonly kind: "expiring"; readonly milliseconds: Milliseconds }
