import type { Attributes, Meter, MeterProvider } from "@opentelemetry/api"

export type TelemetryOptions = {
  /** Defaults to the globally registered provider. */
  meterProvider?: MeterProvider

  /** Takes precedence over `meterProvider`. */
  meter?: Meter

  /** Added to every recorded measurement. */
  attributes?: Attributes

  /**
   * Emitted as the `db.system` attribute. Default: `"redis"`.
   */
  dbSystem?: string

  /**
   * Bucket boundaries, in seconds, for store command durations.
   * Default: `exponentialBuckets(0.001, 2, 10)` (1ms to 512ms).
   *
   * @remarks
   * Serialization and compression histograms keep their own fixed boundaries
   * (1ms to 16ms); a pipeline stage is local work, far shorter than a round trip.
   */
  buckets?: readonly number[]
}
