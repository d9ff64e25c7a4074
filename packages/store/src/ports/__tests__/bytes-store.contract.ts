import { bytes, entry, keys } from "../../tests/utils/store-test-helpers"
import type { BytesStore } from "../bytes-store"

export type StoreUnderTest = {
  store: BytesStore
  /** Moves the store's notion of "now" forward. */
  advance(ms: number): void
}

type CreateStore = () => StoreUnderTest

export function describeBytesStoreContract(adapterName: string, createStore: CreateStore): void {
  describe(`BytesStore Contract Tests - ${adapterName}`, () => {
    let store: BytesStore
    let advance: (ms: number) => void

    beforeEach(() => {
      const created = createStore()
      store = created.store
      advance = created.advance
    })

    describe("get/set", () => {
      it("returns not_found when key is absent", async () => {
        expect(await store.get("missing")).toStrictEqual({ kind: "not_found" })
      })

      it("returns the same bytes that were set", async () => {
        const [key, value] = entry(keys.one(), bytes.a())

        await store.set(key, value)

        expect(await store.get(key)).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("stores empty payloads as found", async () => {
        await store.set(keys.one(), bytes.empty())

        expect(await store.get(keys.one())).toStrictEqual({
          kind: "found",
          value: bytes.empty(),
        })
      })

      it("overwrites an existing value", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.one(), bytes.b())

        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })

    describe("getMany", () => {
      it("returns an empty array for no keys", async () => {
        expect(await store.getMany([])).toStrictEqual([])
      })

      it("returns results positionally, including duplicates", async () => {
        await store.set(keys.one(), bytes.a())
        await store.set(keys.three(), bytes.c())

        const res = await store.getMany([keys.three(), keys.two(), keys.one(), keys.three()])

        expect(res).toStrictEqual([
          { kind: "found", value: bytes.c() },
          { kind: "not_found" },
          { kind: "found", value: bytes.a() },
          { kind: "found", value: bytes.c() },
        ])
      })
    })

    describe("setMany", () => {
      it("writes every entry", async () => {
        await store.setMany([entry(keys.one(), bytes.a()), entry(keys.two(), bytes.b())])

        expect(await store.getMany([keys.one(), keys.two()])).toStrictEqual([
          { kind: "found", value: bytes.a() },
          { kind: "found", value: bytes.b() },
        ])
      })
    })

    describe("delete/has", () => {
      it("removes an entry", async () => {
        await store.set(keys.one(), bytes.a())
        await store.delete(keys.one())

        expect(await store.has(keys.one())).toBe(false)
        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
      })

      it("deleting an absent key is a no-op", async () => {
        await expect(store.delete("missing")).resolves.toBeUndefined()
      })

      it("has reports presence", async () => {
        await store.set(keys.one(), bytes.a())

        expect(await store.has(keys.one())).toBe(true)
        expect(await store.has(keys.two())).toBe(false)
      })
    })

    describe("conditional writes", () => {
      it("setIfAbsent writes only when the key is missing", async () => {
        expect(await store.setIfAbsent(keys.one(), bytes.a())).toStrictEqual({ kind: "written" })
        expect(await store.setIfAbsent(keys.one(), bytes.b())).toStrictEqual({ kind: "skipped" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("setIfPresent writes only when the key exists", async () => {
        expect(await store.setIfPresent(keys.one(), bytes.a())).toStrictEqual({ kind: "skipped" })
        expect(await store.has(keys.one())).toBe(false)

        await store.set(keys.one(), bytes.a())

        expect(await store.setIfPresent(keys.one(), bytes.b())).toStrictEqual({ kind: "written" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })
    })

    describe("compareAndSet", () => {
      it("writes when expected is null and the key is absent", async () => {
        const res = await store.compareAndSet(keys.one(), null, bytes.a())

        expect(res).toStrictEqual({ kind: "written" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("conflicts when expected is null but the key exists", async () => {
        await store.set(keys.one(), bytes.a())

        const res = await store.compareAndSet(keys.one(), null, bytes.b())

        expect(res).toStrictEqual({ kind: "conflict" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("writes when the current bytes equal expected", async () => {
        await store.set(keys.one(), bytes.a())

        const res = await store.compareAndSet(keys.one(), bytes.a(), bytes.b())

        expect(res).toStrictEqual({ kind: "written" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.b() })
      })

      it("conflicts when the current bytes differ", async () => {
        await store.set(keys.one(), bytes.c())

        const res = await store.compareAndSet(keys.one(), bytes.a(), bytes.b())

        expect(res).toStrictEqual({ kind: "conflict" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.c() })
      })

      it("conflicts when a value is expected but the key is absent", async () => {
        const res = await store.compareAndSet(keys.one(), bytes.a(), bytes.b())

        expect(res).toStrictEqual({ kind: "conflict" })
        expect(await store.has(keys.one())).toBe(false)
      })

      it("distinguishes an empty payload from an absent key", async () => {
        await store.set(keys.one(), bytes.empty())

        expect(await store.compareAndSet(keys.one(), null, bytes.a())).toStrictEqual({
          kind: "conflict",
        })
        expect(await store.compareAndSet(keys.one(), bytes.empty(), bytes.a())).toStrictEqual({
          kind: "written",
        })
      })
    })

    describe("ttl", () => {
      it("reports not_found for absent keys", async () => {
        expect(await store.ttl("missing")).toStrictEqual({ kind: "not_found" })
      })

      it("reports persistent for entries written without ttl", async () => {
        await store.set(keys.one(), bytes.a())

        expect(await store.ttl(keys.one())).toStrictEqual({ kind: "persistent" })
      })

      it("reports the remaining time of expiring entries", async () => {
        await store.set(keys.one(), bytes.a(), { ttlMs: 10_000 })

        const res = await store.ttl(keys.one())

        expect(res.kind).toBe("expiring")
        if (res.kind === "expiring") {
          expect(res.milliseconds).toBeGreaterThan(0)
          expect(res.milliseconds).toBeLessThanOrEqual(10_000)
        }
      })

      it("expires entries after their ttl", async () => {
        await store.set(keys.one(), bytes.a(), { ttlMs: 1000 })

        advance(1000)

        expect(await store.get(keys.one())).toStrictEqual({ kind: "not_found" })
        expect(await store.has(keys.one())).toBe(false)
      })

      it("a write without ttl clears a previous expiry", async () => {
        await store.set(keys.one(), bytes.a(), { ttlMs: 1000 })
        await store.set(keys.one(), bytes.b())

        expect(await store.ttl(keys.one())).toStrictEqual({ kind: "persistent" })
      })

      it("ttlMs 0 means no expiry", async () => {
        await store.set(keys.one(), bytes.a(), { ttlMs: 0 })

        expect(await store.ttl(keys.one())).toStrictEqual({ kind: "persistent" })
      })

      it("compareAndSet applies the given ttl", async () => {
        await store.compareAndSet(keys.one(), null, bytes.a(), { ttlMs: 500 })

        advance(500)

        expect(await store.has(keys.one())).toBe(false)
      })

      it("expire sets a ttl on an existing key", async () => {
        await store.set(keys.one(), bytes.a())

        expect(await store.expire(keys.one(), 2000)).toBe(true)

        advance(2000)

        expect(await store.has(keys.one())).toBe(false)
      })

      it("expire returns false for absent keys", async () => {
        expect(await store.expire("missing", 2000)).toBe(false)
      })

      it("persist removes the ttl and keeps the value", async () => {
        await store.set(keys.one(), bytes.a(), { ttlMs: 1000 })

        expect(await store.persist(keys.one())).toBe(true)
        advance(5000)

        expect(await store.ttl(keys.one())).toStrictEqual({ kind: "persistent" })
        expect(await store.get(keys.one())).toStrictEqual({ kind: "found", value: bytes.a() })
      })

      it("persist reports whether the key exists", async () => {
        await store.set(keys.one(), bytes.a())

        expect(await store.persist(keys.one())).toBe(true)
        expect(await store.persist("missing")).toBe(false)
      })
    })

    describe("ping", () => {
      it("resolves", async () => {
        await expect(store.ping()).resolves.toBeUndefined()
      })
    })
  })
}
