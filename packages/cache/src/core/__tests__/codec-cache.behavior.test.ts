import { jsonCodec } from "../../adapters/codecs/json-codec"
import { stringCodec } from "../../adapters/codecs/string-codec"
import { gzipCompressor } from "../../adapters/compressors/zlib-compressors"
import { isCacheError } from "../../errors/cache-error"
import {
  CancelledError,
  EncodeError,
  KeyNotFoundError,
  StoreError,
} from "../../errors/errors"
import type { Codec } from "../../ports/codec"
import {
  createTestCache,
  type Person,
  people,
  recordingHook,
} from "../../tests/utils/cache-test-helpers"

describe("CodecCache (behavior)", () => {
  describe("set / get / delete", () => {
    it("stores, reads and deletes a value", async () => {
      const { cache } = createTestCache(jsonCodec<Person>())

      await cache.set("person", people.bob())
      expect(await cache.get("person")).toStrictEqual({ name: "Bob", age: 42 })

      await cache.delete("person")
      const err = await cache.get("person").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(KeyNotFoundError)
      expect(isCacheError(err, "key_not_found")).toBe(true)
    })

    it("reports a never-written key as KeyNotFoundError", async () => {
      const { cache } = createTestCache(jsonCodec<Person>())

      const err = await cache.get("nobody").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(KeyNotFoundError)
      expect(err).toMatchObject({
        code: "key_not_found",
        message: "key not found: nobody",
        context: { operation: "get", key: "nobody" },
      })
    })

    it("does not log a missing key", async () => {
      const { cache, logger } = createTestCache(jsonCodec<Person>())

      await cache.get("nobody").catch(() => undefined)

      expect(logger.warn).not.toHaveBeenCalled()
      expect(logger.error).not.toHaveBeenCalled()
    })

    it("treats deleting an absent key as success", async () => {
      const { cache } = createTestCache(jsonCodec<Person>())

      await expect(cache.delete("nobody")).resolves.toBeUndefined()
    })

    it("stores compressed bytes when a compressor is configured", async () => {
      const { cache, store } = createTestCache(stringCodec, { compressor: gzipCompressor })

      await cache.set("greeting", "hello")

      const raw = await store.get("greeting")
      expect(raw.kind).toBe("found")
      if (raw.kind === "found") {
        expect(gzipCompressor.decompress(raw.value)).toStrictEqual(Buffer.from("hello"))
      }
      expect(await cache.get("greeting")).toBe("hello")
    })

    it("fails encoding before touching the store", async () => {
      const broken: Codec<string> = {
        encode: () => {
          throw new Error("unsupported")
        },
        decode: (bytes) => new TextDecoder().decode(bytes),
      }
      const { cache, store } = createTestCache(broken)
      const spy = vi.spyOn(store, "set")

      await expect(cache.set("k", "v")).rejects.toThrow(EncodeError)
      expect(spy).not.toHaveBeenCalled()
    })
  })

  describe("ttl", () => {
    it("writes without expiry by default", async () => {
      const { cache } = createTestCache(stringCodec)

      await cache.set("k", "v")

      expect(await cache.ttl("k")).toStrictEqual({ kind: "persistent" })
    })

    it("treats a zero ttl as no expiry", async () => {
      const { cache } = createTestCache(stringCodec)

      await cache.set("k", "v", { ttl: { kind: "seconds", seconds: 0 } })

      expect(await cache.ttl("k")).toStrictEqual({ kind: "persistent" })
    })

    it("expires entries written with a ttl", async () => {
      const { cache, clock } = createTestCache(stringCodec)

      await cache.set("k", "v", { ttl: { kind: "milliseconds", milliseconds: 500 } })
      expect(await cache.ttl("k")).toStrictEqual({ kind: "expiring", milliseconds: 500 })

      clock.advance(500)

      await expect(cache.get("k")).rejects.toThrow(KeyNotFoundError)
    })

    it("expire updates the ttl of an existing key", async () => {
      const { cache } = createTestCache(stringCodec)
      await cache.set("k", "v")

      expect(await cache.expire("k", { kind: "seconds", seconds: 2 })).toBe(true)
      expect(await cache.ttl("k")).toStrictEqual({ kind: "expiring", milliseconds: 2000 })
      expect(await cache.expire("missing", { kind: "seconds", seconds: 2 })).toBe(false)
    })

    it("expire with a zero ttl keeps the value and drops its expiry", async () => {
      const { cache, clock } = createTestCache(stringCodec)
      await cache.set("k", "v", { ttl: { kind: "seconds", seconds: 5 } })

      expect(await cache.expire("k", { kind: "seconds", seconds: 0 })).toBe(true)
      clock.advance(10_000)

      expect(await cache.has("k")).toBe(true)
      expect(await cache.ttl("k")).toStrictEqual({ kind: "persistent" })
      expect(await cache.get("k")).toBe("v")
    })

    it("expire with a zero ttl reports an absent key", async () => {
      const { cache, store } = createTestCache(stringCodec)
      const expireSpy = vi.spyOn(store, "expire")

      expect(await cache.expire("missing", { kind: "milliseconds", milliseconds: 0 })).toBe(false)
      expect(expireSpy).not.toHaveBeenCalled()
    })

    it("expire rejects a negative ttl without touching the store", async () => {
      const { cache, store } = createTestCache(stringCodec)
      await cache.set("k", "v")
      const persistSpy = vi.spyOn(store, "persist")

      await expect(cache.expire("k", { kind: "seconds", seconds: -1 })).rejects.toThrow(
        RangeError,
      )
      expect(persistSpy).not.toHaveBeenCalled()
      expect(await cache.get("k")).toBe("v")
    })

    it("rejects a negative ttl", async () => {
      const { cache } = createTestCache(stringCodec)

      await expect(
        cache.set("k", "v", { ttl: { kind: "milliseconds", milliseconds: -1 } }),
      ).rejects.toThrow(RangeError)
    })
  })

  describe("conditional writes", () => {
    it("setIfAbsent writes only the first value", async () => {
      const { cache } = createTestCache(stringCodec)

      expect(await cache.setIfAbsent("k", "first")).toBe(true)
      expect(await cache.setIfAbsent("k", "second")).toBe(false)
      expect(await cache.get("k")).toBe("first")
    })

    it("setIfPresent only overwrites existing keys", async () => {
      const { cache } = createTestCache(stringCodec)

      expect(await cache.setIfPresent("k", "v")).toBe(false)
      expect(await cache.has("k")).toBe(false)

      await cache.set("k", "v")

      expect(await cache.setIfPresent("k", "w")).toBe(true)
      expect(await cache.get("k")).toBe("w")
    })
  })

  describe("getMany / setMany", () => {
    it("returns per-key outcomes in request order", async () => {
      const { cache } = createTestCache(jsonCodec<Person>(), { batchSize: 1 })
      await cache.set("bob", people.bob())
      await cache.set("alice", people.alice())

      const res = await cache.getMany(["alice", "carol", "bob"])

      expect(res).toStrictEqual([
        { kind: "found", key: "alice", value: { name: "Alice", age: 31 } },
        { kind: "not_found", key: "carol" },
        { kind: "found", key: "bob", value: { name: "Bob", age: 42 } },
      ])
    })

    it("uses the per-call batch size over the configured one", async () => {
      const { cache, store } = createTestCache(stringCodec, { batchSize: 1 })
      const spy = vi.spyOn(store, "getMany")

      await cache.getMany(["a", "b", "c"], { batchSize: 0 })

      expect(spy).toHaveBeenCalledOnce()
    })

    it("rejects an invalid per-call batch size", async () => {
      const { cache } = createTestCache(stringCodec)

      await expect(cache.getMany(["a"], { batchSize: -1 })).rejects.toThrow(RangeError)
    })

    it("setMany writes in batches", async () => {
      const { cache, store } = createTestCache(stringCodec, { batchSize: 2 })
      const spy = vi.spyOn(store, "setMany")

      await cache.setMany([
        ["a", "1"],
        ["b", "2"],
        ["c", "3"],
      ])

      expect(spy).toHaveBeenCalledTimes(2)
      expect((await cache.getMany(["a", "b", "c"])).map((o) => o.kind)).toStrictEqual([
        "found",
        "found",
        "found",
      ])
    })

    it("setMany writes nothing when one value fails to encode", async () => {
      const picky: Codec<string> = {
        encode: (value) => {
          if (value === "bad") throw new Error("rejected")
          return new TextEncoder().encode(value)
        },
        decode: (bytes) => new TextDecoder().decode(bytes),
      }
      const { cache } = createTestCache(picky)

      await expect(
        cache.setMany([
          ["a", "ok"],
          ["b", "bad"],
        ]),
      ).rejects.toThrow(EncodeError)
      expect(await cache.has("a")).toBe(false)
    })
  })

  describe("hooks", () => {
    it("runs each executed stage exactly once per operation", async () => {
      const calls: string[] = []
      const { cache } = createTestCache(stringCodec, {
        compressor: gzipCompressor,
        hooks: [recordingHook("h", calls)],
      })

      await cache.set("k", "v")
      expect(calls.filter((c) => c.endsWith(":in"))).toStrictEqual(["h:encode:in", "h:compress:in"])

      calls.length = 0
      await cache.get("k")
      expect(calls.filter((c) => c.endsWith(":in"))).toStrictEqual([
        "h:decompress:in",
        "h:decode:in",
      ])
    })

    it("does not run decode stages for a missing key", async () => {
      const calls: string[] = []
      const { cache } = createTestCache(stringCodec, { hooks: [recordingHook("h", calls)] })

      await cache.get("missing").catch(() => undefined)

      expect(calls).toStrictEqual([])
    })

    it("addHook appends an innermost hook to later operations", async () => {
      const calls: string[] = []
      const { cache } = createTestCache(stringCodec, { hooks: [recordingHook("outer", calls)] })

      cache.addHook(recordingHook("inner", calls))
      await cache.set("k", "v")

      expect(calls).toStrictEqual([
        "outer:encode:in",
        "inner:encode:in",
        "inner:encode:out",
        "outer:encode:out",
      ])
    })
  })

  describe("store failures", () => {
    it("wraps store errors in StoreError with context and cause", async () => {
      const { cache, store } = createTestCache(stringCodec)
      const cause = new Error("connection reset")
      vi.spyOn(store, "get").mockRejectedValue(cause)

      const err = await cache.get("k").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(StoreError)
      if (err instanceof StoreError) {
        expect(err.message).toBe("store get failed: connection reset")
        expect(err.isRetryable).toBe(true)
        expect(err.context).toStrictEqual({ operation: "get", key: "k" })
        expect(err.cause).toBe(cause)
      }
    })

    it("reports cancellation distinctly from store failures", async () => {
      const { cache, store } = createTestCache(stringCodec)
      vi.spyOn(store, "get").mockReturnValue(new Promise(() => {}))
      const controller = new AbortController()

      const pending = cache.get("k", { signal: controller.signal })
      controller.abort()

      await expect(pending).rejects.toThrow(CancelledError)
    })
  })

  describe("healthy", () => {
    it("resolves true when the store answers", async () => {
      const { cache } = createTestCache(stringCodec)

      expect(await cache.healthy()).toBe(true)
    })

    it("resolves false and logs when the store fails", async () => {
      const { cache, store, logger } = createTestCache(stringCodec)
      vi.spyOn(store, "ping").mockRejectedValue(new Error("down"))

      expect(await cache.healthy()).toBe(false)
      expect(logger.warn).toHaveBeenCalledExactlyOnceWith(
        "cache store is unhealthy",
        expect.objectContaining({ operation: "ping", err: expect.any(StoreError) }),
      )
    })
  })

  describe("configuration", () => {
    it.each([-1, 1.5, Number.NaN])("rejects batchSize %s", (batchSize) => {
      expect(() => createTestCache(stringCodec, { batchSize })).toThrow(RangeError)
    })

    it("rejects maxAttempts below 1", () => {
      expect(() => createTestCache(stringCodec, { upsert: { maxAttempts: 0 } })).toThrow(
        "maxAttempts must be an integer >= 1 (got 0)",
      )
    })
  })
})
