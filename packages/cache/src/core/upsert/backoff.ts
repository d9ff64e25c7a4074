import type { DelayPolicy } from "../../ports/delay-policy"
import type { Milliseconds } from "../../ports/time"

/**
 * Source of randomness in [0, 1).
 */
export type RandomSource = () => number

export type ExponentialBackoffOptions = {
  baseMs: Milliseconds

  /** Multiplier per attempt. Default: 2 */
  factor?: number

  /** Ceiling for any single delay. */
  maxMs: Milliseconds

  /**
   * Full jitter picks a delay uniformly from `[0, delay]`. Default: `"full"`.
   */
  jitter?: "none" | "full"
}

function validate(name: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name} must be finite and >= 0 (got ${ms})`)
  }
}

export function exponentialBackoff(
  options: ExponentialBackoffOptions,
  random: RandomSource = Math.random,
): DelayPolicy {
  const { baseMs, factor = 2, maxMs, jitter = "full" } = options

  validate("baseMs", baseMs)
  validate("maxMs", maxMs)

  if (!Number.isFinite(factor) || factor < 1) {
    throw new RangeError(`factor must be finite and >= 1 (got ${factor})`)
  }

  return {
    getDelay(attempt: number): Milliseconds {
      const raw = Math.min(maxMs, baseMs * factor ** attempt)
      const delay = jitter === "full" ? Math.floor(random() * (raw + 1)) : raw

      return Math.floor(Math.min(maxMs, Math.max(0, delay)))
    },
  }
}

export const noBackoff: DelayPolicy = {
  getDelay(): Milliseconds {
    return 0
  },
}
