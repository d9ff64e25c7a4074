import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
// fatal: invalid UTF-8 is a decode failure, not replacement characters
const decoder = new TextDecoder("utf-8", { fatal: true })

export const stringCodec: Codec<string> = {
  encode: (value: string) => encoder.encode(value),
  decode: (data: Uint8Array) => decoder.decode(data),
}
