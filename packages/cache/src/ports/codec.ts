/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs should be pure, deterministic transforms. For every value `v` the codec
 * accepts, `decode(encode(v))` must be observably equal to `v`. Failures are
 * reported by throwing; the pipeline classifies them.
 *
 * @example
 * ```ts
 * const userCodec: Codec<User> = {
 *   encode(value) {
 *     return new TextEncoder().encode(JSON.stringify(value))
 *   },
 *   decode(bytes) {
 *     return UserSchema.parse(JSON.parse(new TextDecoder().decode(bytes)))
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
