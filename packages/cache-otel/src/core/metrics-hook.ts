import type { Attributes, Counter, Histogram } from "@opentelemetry/api"
import type { Hook, PipelineStage } from "@stowaway/cache"
import type { TelemetryOptions } from "../ports/options"
import { resolveConfig, type TelemetryConfig } from "./config"

export type HookTarget = {
  addHook(hook: Hook): void
}

type StageInstruments = {
  duration: Histogram
  errors: Counter
}

/**
 * Observational hook recording how long each pipeline stage takes and how often
 * it fails.
 *
 * @remarks
 * - `cache.serialization.*` covers encode and decode, `cache.compression.*`
 *   compress and decompress; the `operation` attribute names the stage.
 * - Durations are recorded in seconds, failures included, against the fixed
 *   `stageBuckets` of the config.
 */
export function createMetricsHook(config: TelemetryConfig): Hook {
  const { meter, stageBuckets, attributes } = config

  const serialization: StageInstruments = {
    duration: meter.createHistogram("cache.serialization.duration", {
      description: "Duration of encoding and decoding values",
      unit: "s",
      advice: { explicitBucketBoundaries: stageBuckets },
    }),
    errors: meter.createCounter("cache.serialization.errors", {
      description: "Count of failed encode and decode operations",
    }),
  }

  const compression: StageInstruments = {
    duration: meter.createHistogram("cache.compression.duration", {
      description: "Duration of compressing and decompressing payloads",
      unit: "s",
      advice: { explicitBucketBoundaries: stageBuckets },
    }),
    errors: meter.createCounter("cache.compression.errors", {
      description: "Count of failed compress and decompress operations",
    }),
  }

  function measure<A, R>(
    stage: PipelineStage,
    instruments: StageInstruments,
    next: (arg: A) => R,
  ): (arg: A) => R {
    const attrs: Attributes = { ...attributes, operation: stage }

    return (arg: A): R => {
      const start = performance.now()
      try {
        return next(arg)
      } catch (err) {
        instruments.errors.add(1, attrs)
        throw err
      } finally {
        instruments.duration.record((performance.now() - start) / 1000, attrs)
      }
    }
  }

  return {
    name: "otel-metrics",
    kind: "observational",
    wrapEncode: (next) => measure("encode", serialization, next),
    wrapDecode: (next) => measure("decode", serialization, next),
    wrapCompress: (next) => measure("compress", compression, next),
    wrapDecompress: (next) => measure("decompress", compression, next),
  }
}

/**
 * Registers the metrics hook on a cache.
 *
 * @example
 * ```ts
 * const { cache } = createRedisCache({ config, codec: jsonCodec<Profile>() })
 * instrumentMetrics(cache, { attributes: { "cache.name": "profiles" } })
 * ```
 */
export function instrumentMetrics(target: HookTarget, opts: TelemetryOptions = {}): void {
  target.addHook(createMetricsHook(resolveConfig(opts)))
}
