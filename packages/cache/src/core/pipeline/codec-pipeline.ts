import type { CacheOperation } from "../../errors/cache-error"
import { DataCorruptionError, EncodeError } from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import type { Compressor } from "../../ports/compressor"
import type { BytesFn, DecodeFn, EncodeFn, Hook, PipelineStage } from "../../ports/hook"
import { errorMessage } from "../error-message"
import { composeCompress, composeDecode, composeDecompress, composeEncode } from "./compose-hooks"

export type CodecPipelineDeps<T> = {
  codec: Codec<T>
  compressor?: Compressor
}

export type PipelineCallContext = {
  operation?: CacheOperation
  key?: string
}

/**
 * `compress(encode(value))` on the way in, `decode(decompress(bytes))` on the way out,
 * each stage wrapped by the registered hooks.
 *
 * @remarks
 * Whatever a stage (or a hook around it) throws is classified here:
 * - encode and compress failures become `EncodeError`
 * - decompress and decode failures become `DataCorruptionError`
 *
 * Instances are immutable; `withHook` returns a new pipeline.
 */
export class CodecPipeline<T> {
  private readonly encode: EncodeFn<T>
  private readonly decode: DecodeFn<T>
  private readonly compress: BytesFn | undefined
  private readonly decompress: BytesFn | undefined

  public constructor(
    private readonly deps: CodecPipelineDeps<T>,
    readonly hooks: readonly Hook[] = [],
  ) {
    const { codec, compressor } = deps

    this.encode = composeEncode(hooks, (value: T) => codec.encode(value))
    this.decode = composeDecode(hooks, (bytes) => codec.decode(bytes))

    if (compressor) {
      this.compress = composeCompress(hooks, (bytes) => compressor.compress(bytes))
      this.decompress = composeDecompress(hooks, (bytes) => compressor.decompress(bytes))
    }
  }

  withHook(hook: Hook): CodecPipeline<T> {
    return new CodecPipeline(this.deps, [...this.hooks, hook])
  }

  toBytes(value: T, context: PipelineCallContext = {}): Uint8Array {
    let encoded: Uint8Array
    try {
      encoded = this.encode(value)
    } catch (err) {
      throw this.encodeFailure(err, "encode", context)
    }

    if (!this.compress) return encoded

    try {
      return this.compress(encoded)
    } catch (err) {
      throw this.encodeFailure(err, "compress", context)
    }
  }

  fromBytes(bytes: Uint8Array, context: PipelineCallContext = {}): T {
    let decompressed = bytes
    if (this.decompress) {
      try {
        decompressed = this.decompress(bytes)
      } catch (err) {
        throw this.decodeFailure(err, "decompress", context)
      }
    }

    try {
      return this.decode(decompressed)
    } catch (err) {
      throw this.decodeFailure(err, "decode", context)
    }
  }

  private encodeFailure(
    err: unknown,
    stage: PipelineStage,
    context: PipelineCallContext,
  ): EncodeError {
    if (err instanceof EncodeError) return err

    return new EncodeError(`${stage} failed: ${errorMessage(err)}`, {
      cause: err,
      context: { ...context, stage },
    })
  }

  private decodeFailure(
    err: unknown,
    stage: PipelineStage,
    context: PipelineCallContext,
  ): DataCorruptionError {
    if (err instanceof DataCorruptionError) return err

    return new DataCorruptionError(`${stage} failed: ${errorMessage(err)}`, {
      cause: err,
      context: { ...context, stage },
    })
  }
}
