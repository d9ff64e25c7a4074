import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

type LogFn<TContext extends LogContext> = (message: string, meta?: LogMeta<TContext>) => void

function discard(): void {}

/**
 * Drops every record. Stands in wherever a cache or store is built without a logger.
 */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace: LogFn<TContext> = discard
  readonly debug: LogFn<TContext> = discard
  readonly info: LogFn<TContext> = discard
  readonly warn: LogFn<TContext> = discard
  readonly error: LogFn<TContext> = discard
  readonly fatal: LogFn<TContext> = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<
  TContext extends LogContext = LogContext,
>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
