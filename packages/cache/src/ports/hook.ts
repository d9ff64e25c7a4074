export type PipelineStage = "encode" | "decode" | "compress" | "decompress"

export type EncodeFn<T> = (value: T) => Uint8Array
export type DecodeFn<T> = (bytes: Uint8Array) => T
export type BytesFn = (bytes: Uint8Array) => Uint8Array

/**
 * `observational` hooks forward inputs, outputs and errors untouched.
 * `transformational` hooks may change what they forward.
 */
export type HookKind = "observational" | "transformational"

/**
 * Middleware around the pipeline stages.
 *
 * @remarks
 * Each wrap method receives the next function in the chain and returns a
 * replacement with the same signature. Hooks registered first are outermost:
 * with hooks `[h1, h2]`, calling encode runs `h1` → `h2` → codec.
 *
 * A hook may observe or rethrow errors but must never swallow them. The
 * pipeline re-classifies whatever a hook throws, so a hook cannot turn a
 * decode failure into something else.
 *
 * Stages a hook does not implement are passed through. Compression stages only
 * run (and so only reach hooks) when a compressor is configured.
 */
export interface Hook {
  readonly name?: string
  readonly kind?: HookKind

  wrapEncode?<T>(next: EncodeFn<T>): EncodeFn<T>
  wrapDecode?<T>(next: DecodeFn<T>): DecodeFn<T>
  wrapCompress?(next: BytesFn): BytesFn
  wrapDecompress?(next: BytesFn): BytesFn
}
