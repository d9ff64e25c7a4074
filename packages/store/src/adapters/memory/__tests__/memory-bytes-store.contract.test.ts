import { describeBytesStoreContract } from "../../../ports/__tests__/bytes-store.contract"
import { FakeClock } from "../../clock/fake-clock"
import { MemoryBytesStore } from "../memory-bytes-store"

describeBytesStoreContract("MemoryBytesStore", () => {
  const clock = new FakeClock(1_000_000)

  return {
    store: new MemoryBytesStore({ clock }, { maxEntries: 1000 }),
    advance: (ms) => clock.advance(ms),
  }
})
