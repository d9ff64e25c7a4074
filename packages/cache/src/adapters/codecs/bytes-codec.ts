import type { Codec } from "../../ports/codec"

export const bytesCodec: Codec<Uint8Array> = {
  encode: (value: Uint8Array) => new Uint8Array(value),
  decode: (data: Uint8Array) => new Uint8Array(data),
}
