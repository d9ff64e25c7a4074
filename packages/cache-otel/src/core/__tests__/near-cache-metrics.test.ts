import type { Meter, ObservableCounter, ObservableResult } from "@opentelemetry/api"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { instrumentNearCache } from "../near-cache-metrics"

describe("instrumentNearCache", () => {
  let meter: Mock<Meter>
  let hits: Mock<ObservableCounter>
  let misses: Mock<ObservableCounter>

  beforeEach(() => {
    meter = mock<Meter>()
    hits = mock<ObservableCounter>()
    misses = mock<ObservableCounter>()
    meter.createObservableCounter.mockImplementation((name) =>
      name === "cache.near_cache.hits" ? hits : misses,
    )
  })

  function collect(counter: Mock<ObservableCounter>): Mock<ObservableResult> {
    const result = mock<ObservableResult>()
    for (const [callback] of counter.addCallback.mock.calls) {
      void callback(result)
    }
    return result
  }

  it("reports the current hit and miss counts on each collection", () => {
    const stats = { hitCount: 3, missCount: 1 }

    instrumentNearCache({ stats: () => stats }, { meter, attributes: { "cache.name": "people" } })

    const attrs = { "cache.name": "people", "db.system": "redis" }
    expect(collect(hits).observe).toHaveBeenCalledExactlyOnceWith(3, attrs)
    expect(collect(misses).observe).toHaveBeenCalledExactlyOnceWith(1, attrs)

    stats.hitCount = 10
    expect(collect(hits).observe).toHaveBeenCalledExactlyOnceWith(10, attrs)
  })

  it("names the counters", () => {
    instrumentNearCache({ stats: () => ({ hitCount: 0, missCount: 0 }) }, { meter })

    expect(meter.createObservableCounter.mock.calls.map(([name]) => name)).toStrictEqual([
      "cache.near_cache.hits",
      "cache.near_cache.misses",
    ])
  })

  it("detaches both callbacks", () => {
    const detach = instrumentNearCache({ stats: () => ({ hitCount: 0, missCount: 0 }) }, { meter })
    const [[observeHits]] = hits.addCallback.mock.calls
    const [[observeMisses]] = misses.addCallback.mock.calls

    detach()

    expect(hits.removeCallback).toHaveBeenCalledExactlyOnceWith(observeHits)
    expect(misses.removeCallback).toHaveBeenCalledExactlyOnceWith(observeMisses)
  })
})
