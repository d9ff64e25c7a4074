export { exponentialBuckets } from "./core/buckets"
export {
  instrumentationName,
  instrumentationVersion,
  resolveConfig,
  type TelemetryConfig,
} from "./core/config"
export { InstrumentedStore, instrumentStore } from "./core/instrumented-store"
export { createMetricsHook, type HookTarget, instrumentMetrics } from "./core/metrics-hook"
export { instrumentNearCache } from "./core/near-cache-metrics"
export type { NearCacheStatsSource } from "./ports/near-cache-stats"
export type { TelemetryOptions } from "./ports/options"
