import type { Logger } from "@stowaway/logger"
import { type Clock, SystemClock } from "@stowaway/store"
import type { Hook, PipelineStage } from "../../ports/hook"

export type LoggingHookDeps = {
  logger: Logger
  clock?: Clock
}

/**
 * Observational hook: logs each stage at `debug` with its duration, and
 * failures at `warn` before rethrowing them unchanged.
 */
export function createLoggingHook(deps: LoggingHookDeps): Hook {
  const logger = deps.logger.child({ module: "cache-pipeline" })
  const clock = deps.clock ?? new SystemClock()

  function observe<A, R>(stage: PipelineStage, next: (arg: A) => R): (arg: A) => R {
    return (arg: A): R => {
      const start = clock.nowMs()
      try {
        const result = next(arg)
        logger.debug("cache stage completed", { stage, durationMs: clock.nowMs() - start })
        return result
      } catch (err) {
        logger.warn("cache stage failed", { stage, durationMs: clock.nowMs() - start, err })
        throw err
      }
    }
  }

  return {
    name: "logging",
    kind: "observational",
    wrapEncode: (next) => observe("encode", next),
    wrapDecode: (next) => observe("decode", next),
    wrapCompress: (next) => observe("compress", next),
    wrapDecompress: (next) => observe("decompress", next),
  }
}
