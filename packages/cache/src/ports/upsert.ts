/**
 * What the store held when the attempt read the key.
 */
export type UpsertPrior<T> =
  | { readonly kind: "found"; readonly value: T }
  | { readonly kind: "not_found" }

export type UpsertDecision<T> =
  | { readonly kind: "write"; readonly value: T }
  | { readonly kind: "abort" }

/**
 * Computes the next value from the prior one.
 *
 * @remarks
 * May run more than once per `upsert` call when conflicts are retried
 * internally, so it should be free of side effects.
 */
export type UpsertFn<T> = (
  prior: UpsertPrior<T>,
) => UpsertDecision<T> | Promise<UpsertDecision<T>>

export type UpsertResult<T> =
  | { readonly kind: "written"; readonly value: T; readonly attempts: number }
  | { readonly kind: "aborted"; readonly attempts: number }
