import type { Logger } from "@stowaway/logger"
import type { BytesStore, StoreResult } from "@stowaway/store"
import { DecodeError } from "../../errors/errors"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheGetManyOutcome } from "../../ports/cache-result"
import { chunks } from "../chunks"
import type { CodecPipeline } from "../pipeline/codec-pipeline"
import { storeCall } from "../store-call"

export type GetManyDeps<T> = {
  store: BytesStore
  pipeline: CodecPipeline<T>
  logger: Logger
}

export type GetManyOptions = {
  /** `0` sends every key in one round trip. */
  batchSize: number
  signal?: AbortSignal | undefined
}

/**
 * Reads `keys` in contiguous batches, one round trip per batch, issued in order.
 *
 * @remarks
 * The result has one outcome per requested key, in request order, duplicates
 * included. Decode failures are isolated to their key; a failed round trip, or
 * a reply with the wrong number of results, rejects the whole call.
 */
export async function getMany<T>(
  deps: GetManyDeps<T>,
  keys: readonly CacheKey[],
  opts: GetManyOptions,
): Promise<CacheGetManyOutcome<T>[]> {
  const out: CacheGetManyOutcome<T>[] = []

  for (const batch of chunks(keys, opts.batchSize)) {
    const results = await storeCall(
      async () => {
        const res = await deps.store.getMany(batch, { signal: opts.signal })
        if (res.length !== batch.length) {
          throw new Error(`expected ${batch.length} results, got ${res.length}`)
        }
        return res
      },
      { operation: "mget", keyCount: batch.length, signal: opts.signal },
    )

    batch.forEach((key, i) => {
      out.push(toOutcome(deps, key, results[i]))
    })
  }

  return out
}

function toOutcome<T>(
  deps: GetManyDeps<T>,
  key: CacheKey,
  result: StoreResult,
): CacheGetManyOutcome<T> {
  if (result.kind === "not_found") return { kind: "not_found", key }

  try {
    const value = deps.pipeline.fromBytes(result.value, { operation: "mget", key })
    return { kind: "found", key, value }
  } catch (err) {
    if (!(err instanceof DecodeError)) throw err

    deps.logger.warn("cache entry could not be decoded", { operation: "mget", key, err })
    return { kind: "error", key, error: err }
  }
}
