import { type Attributes, type Meter, metrics } from "@opentelemetry/api"
import type { TelemetryOptions } from "../ports/options"
import { exponentialBuckets } from "./buckets"

export const instrumentationName = "@stowaway/cache-otel"
export const instrumentationVersion = "0.1.0"

export type TelemetryConfig = {
  meter: Meter
  attributes: Attributes
  /** Store command histograms. */
  buckets: number[]
  /** Pipeline stage histograms: 1ms to 16ms. */
  stageBuckets: number[]
}

export function resolveConfig(opts: TelemetryOptions = {}): TelemetryConfig {
  const meter =
    opts.meter ??
    (opts.meterProvider ?? metrics.getMeterProvider()).getMeter(
      instrumentationName,
      instrumentationVersion,
    )

  return {
    meter,
    attributes: { ...opts.attributes, "db.system": opts.dbSystem ?? "redis" },
    buckets: opts.buckets ? [...opts.buckets] : exponentialBuckets(0.001, 2, 10),
    stageBuckets: exponentialBuckets(0.001, 2, 5),
  }
}
