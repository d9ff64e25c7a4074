/**
 * Lossless, symmetric byte transform applied after encoding and reversed before decoding.
 *
 * @remarks
 * Implementations must accept empty input.
 */
export interface Compressor {
  readonly name: string

  compress(bytes: Uint8Array): Uint8Array

  decompress(bytes: Uint8Array): Uint8Array
}
