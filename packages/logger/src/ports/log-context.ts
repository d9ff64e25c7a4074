/**
 * Well-known structured fields attached to cache log entries.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Cache operation being executed (e.g. "get", "upsert"). */
  operation: string
  key: string

  /** Pipeline stage or store round trip that produced the entry. */
  stage: string

  attempt: number
  durationMs: number

  /** Backoff before the next attempt. */
  delayMs: number

  /** Number of keys in a bulk call or batch. */
  keyCount: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
