import type { CacheTtl } from "../ports/cache-options"
import type { Milliseconds } from "../ports/time"

/**
 * `undefined` for "no expiry".
 */
export function toTtlMs(ttl: CacheTtl | undefined): Milliseconds | undefined {
  if (ttl === undefined) return undefined

  const ms = ttl.kind === "seconds" ? ttl.seconds * 1000 : ttl.milliseconds

  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`ttl must be finite and >= 0 (got ${ms}ms)`)
  }

  if (ms === 0) return undefined

  // Stores take whole milliseconds; never round a positive TTL down to "no expiry".
  return Math.max(1, Math.round(ms))
}

export const ttl = {
  seconds(seconds: number): CacheTtl {
    return { kind: "seconds", seconds }
  },
  milliseconds(milliseconds: Milliseconds): CacheTtl {
    return { kind: "milliseconds", milliseconds }
  },
}
