import {
  brotliCompressSync,
  brotliDecompressSync,
  deflateSync,
  gunzipSync,
  gzipSync,
  inflateSync,
} from "node:zlib"
import type { Compressor } from "../../ports/compressor"

export const gzipCompressor: Compressor = {
  name: "gzip",
  compress: (bytes) => gzipSync(bytes),
  decompress: (bytes) => gunzipSync(bytes),
}

export const deflateCompressor: Compressor = {
  name: "deflate",
  compress: (bytes) => deflateSync(bytes),
  decompress: (bytes) => inflateSync(bytes),
}

export const brotliCompressor: Compressor = {
  name: "brotli",
  compress: (bytes) => brotliCompressSync(bytes),
  decompress: (bytes) => brotliDecompressSync(bytes),
}

export const compressionNames = ["none", "gzip", "deflate", "brotli"] as const

export type CompressionName = (typeof compressionNames)[number]

/**
 * `undefined` for `"none"`: the pipeline then skips the compression stages.
 */
export function compressorFor(name: CompressionName): Compressor | undefined {
  switch (name) {
    case "none":
      return undefined
    case "gzip":
      return gzipCompressor
    case "deflate":
      return deflateCompressor
    case "brotli":
      return brotliCompressor
  }
}
