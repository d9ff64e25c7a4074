import type { ObservableResult } from "@opentelemetry/api"
import type { NearCacheStatsSource } from "../ports/near-cache-stats"
import type { TelemetryOptions } from "../ports/options"
import { resolveConfig } from "./config"

/**
 * Exposes a near cache's cumulative hit and miss counts as observable counters
 * `cache.near_cache.hits` and `cache.near_cache.misses`, read at collection time.
 *
 * @returns a function that detaches the callbacks.
 */
export function instrumentNearCache(
  source: NearCacheStatsSource,
  opts: TelemetryOptions = {},
): () => void {
  const { meter, attributes } = resolveConfig(opts)

  const hits = meter.createObservableCounter("cache.near_cache.hits", {
    description: "Reads answered from the client-side cache",
  })
  const misses = meter.createObservableCounter("cache.near_cache.misses", {
    description: "Reads the client-side cache had to forward to the server",
  })

  const observeHits = (result: ObservableResult) => {
    result.observe(source.stats().hitCount, attributes)
  }
  const observeMisses = (result: ObservableResult) => {
    result.observe(source.stats().missCount, attributes)
  }

  hits.addCallback(observeHits)
  misses.addCallback(observeMisses)

  return () => {
    hits.removeCallback(observeHits)
    misses.removeCallback(observeMisses)
  }
}
