import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * JSON codec that round-trips `Date`, `Map`, `Set`, `BigInt`, `RegExp` and `undefined`.
 *
 * @remarks
 * Decoded values are not validated against `T`. Invalid UTF-8 is rejected
 * with a `TypeError` rather than replaced.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}
