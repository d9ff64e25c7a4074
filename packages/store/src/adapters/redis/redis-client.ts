export type RedisTtl = { PX: number } | { KEEPTTL: true }

export type RedisSetOptions = Partial<{ PX: number; KEEPTTL: true; NX: true; XX: true }>

export type RedisEvalOptions = {
  keys: string[]
  arguments: (string | Buffer)[]
}

/**
 * The subset of a node-redis client the bytes store talks to, with bulk
 * strings mapped to `Buffer`.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  exists(keys: string | readonly string[]): Promise<number>

  quit(): Promise<void>
  connect(): Promise<unknown>
  isOpen: boolean

  ping(): Promise<string | Buffer>

  /**
   * `-2` for a missing key, `-1` for a key without expiry.
   */
  pTTL(key: string): Promise<number>

  /**
   * RESP3 replies with a number, RESP2 clients may map it to a boolean.
   */
  pExpire(key: string, ms: number): Promise<number | boolean>
  persist(key: string): Promise<number>

  set(
    key: string,
    value: Uint8Array | Buffer,
    opts?: RedisSetOptions,
  ): Promise<string | Buffer | null>

  del(keys: string | readonly string[]): Promise<number>

  multi(): {
    set(key: string, value: Uint8Array | Buffer, opts?: RedisSetOptions): unknown
    exec(): Promise<unknown>
  }

  eval(script: string, opts: RedisEvalOptions): Promise<unknown>

  /**
   * Returns a proxy whose commands reject once `signal` aborts.
   */
  withAbortSignal(signal: AbortSignal): RedisBytesClient
}
