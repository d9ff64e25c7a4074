import type { Logger } from "@stowaway/logger"
import type { BytesStore, Clock, Milliseconds } from "@stowaway/store"
import { CancelledError, RetryableConflictError } from "../../errors/errors"
import type { CacheKey } from "../../ports/cache-key"
import type { DelayPolicy } from "../../ports/delay-policy"
import type { UpsertFn, UpsertPrior, UpsertResult } from "../../ports/upsert"
import type { CodecPipeline } from "../pipeline/codec-pipeline"
import { storeCall } from "../store-call"

export type UpsertDeps<T> = {
  store: BytesStore
  pipeline: CodecPipeline<T>
  clock: Clock
  logger: Logger
}

export type UpsertPolicy = {
  /** Total attempts, first one included. `1` never retries. */
  maxAttempts: number
  backoff: DelayPolicy
}

export type UpsertCallOptions = {
  ttlMs?: Milliseconds | undefined
  signal?: AbortSignal | undefined
}

type AttemptOutcome<T> =
  | { kind: "written"; value: T }
  | { kind: "aborted" }
  | { kind: "conflict" }

/**
 * Optimistic read-modify-write of one key.
 *
 * @remarks
 * Each attempt reads the raw bytes, decodes them, asks `update` for a decision
 * and writes with `compareAndSet`, using the bytes it read as the expected
 * value (or `null` when the key was absent). A conflict starts a fresh attempt
 * after the policy's delay, until `maxAttempts` is used up and
 * `RetryableConflictError` is thrown.
 *
 * A prior value that fails to decode rejects immediately; nothing is written.
 */
export async function upsert<T>(
  deps: UpsertDeps<T>,
  key: CacheKey,
  update: UpsertFn<T>,
  policy: UpsertPolicy,
  opts: UpsertCallOptions = {},
): Promise<UpsertResult<T>> {
  const { signal } = opts
  let attempt = 0

  while (true) {
    attempt++

    const outcome = await attemptOnce(deps, key, update, opts)

    if (outcome.kind === "written") {
      return { kind: "written", value: outcome.value, attempts: attempt }
    }
    if (outcome.kind === "aborted") return { kind: "aborted", attempts: attempt }

    if (attempt >= policy.maxAttempts) break

    const delayMs = policy.backoff.getDelay(attempt - 1)
    deps.logger.debug("upsert conflict, retrying", {
      operation: "upsert",
      key,
      attempt,
      delayMs,
    })

    await deps.clock.sleep(delayMs, signal)

    if (signal?.aborted) {
      throw new CancelledError("upsert cancelled", {
        cause: signal.reason,
        context: { operation: "upsert", key, attempts: attempt },
      })
    }
  }

  const meta = { operation: "upsert", key, attempt } as const
  if (policy.maxAttempts === 1) {
    // Without retries a conflict is an ordinary outcome the caller handles.
    deps.logger.debug("upsert conflict", meta)
  } else {
    deps.logger.warn("upsert gave up after conflicting writes", meta)
  }

  throw new RetryableConflictError(key, { context: { operation: "upsert", attempts: attempt } })
}

async function attemptOnce<T>(
  deps: UpsertDeps<T>,
  key: CacheKey,
  update: UpsertFn<T>,
  opts: UpsertCallOptions,
): Promise<AttemptOutcome<T>> {
  const { signal, ttlMs } = opts

  const current = await storeCall(() => deps.store.get(key, { signal }), {
    operation: "upsert",
    key,
    signal,
  })

  const prior: UpsertPrior<T> =
    current.kind === "found"
      ? {
          kind: "found",
          value: deps.pipeline.fromBytes(current.value, { operation: "upsert", key }),
        }
      : { kind: "not_found" }

  const decision = await update(prior)
  if (decision.kind === "abort") return { kind: "aborted" }

  const bytes = deps.pipeline.toBytes(decision.value, { operation: "upsert", key })
  const expected = current.kind === "found" ? current.value : null

  const res = await storeCall(
    () => deps.store.compareAndSet(key, expected, bytes, { ttlMs, signal }),
    { operation: "upsert", key, signal },
  )

  if (res.kind === "conflict") return { kind: "conflict" }

  return { kind: "written", value: decision.value }
}
