import type { CacheErrorContext } from "../errors/cache-error"
import { CancelledError, StoreError } from "../errors/errors"
import { errorMessage } from "./error-message"

export type StoreCallContext = CacheErrorContext & {
  signal?: AbortSignal | undefined
}

function raceAbort<R>(promise: Promise<R>, signal: AbortSignal | undefined): Promise<R> {
  if (!signal) return promise

  return new Promise<R>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    signal.addEventListener("abort", onAbort, { once: true })

    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      },
    )
  })
}

/**
 * Runs one store round trip and classifies its failure.
 *
 * @remarks
 * Rejects with `CancelledError` as soon as `signal` aborts, even if the store
 * ignores the signal, and with `StoreError` for anything the store throws.
 */
export async function storeCall<R>(call: () => Promise<R>, ctx: StoreCallContext): Promise<R> {
  const { signal, ...context } = ctx

  if (signal?.aborted) {
    throw new CancelledError(`${context.operation ?? "store call"} cancelled`, {
      cause: signal.reason,
      context,
    })
  }

  try {
    return await raceAbort(call(), signal)
  } catch (err) {
    if (signal?.aborted) {
      throw new CancelledError(`${context.operation ?? "store call"} cancelled`, {
        cause: signal.reason,
        context,
      })
    }

    throw new StoreError(`store ${context.operation ?? "call"} failed: ${errorMessage(err)}`, {
      cause: err,
      context,
    })
  }
}
