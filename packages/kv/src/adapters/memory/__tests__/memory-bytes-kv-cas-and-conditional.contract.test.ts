import { FakeClock } from "@featurekit/clock"
import { describeCounterContract } from "../../../ports/__tests__/counter.contract"
import { describeKvCasAndConditionalContract } from "../../../ports/__tests__/kv-cas-and-conditional.contract"
import { describeKvStoreContract } from "../../../ports/__tests__/kv-store.contract"
import { MemoryBytesKeyValueStoreCasConditional } from "../memory-bytes-kv-cas-and-conditional"
import { MemoryCounter } from "../memory-counter"

const createFixture = () => {
  const clock = new FakeClock(1_000)

  return { clock, store: new MemoryBytesKeyValueStoreCasConditional({ clock }, { maxEntries: 1000 }) }
}

describeKvStoreContract("MemoryBytesKeyValueStoreCasConditional", createFixture)
describeKvCasAndConditionalContract("MemoryBytesKeyValueStoreCasConditional", createFixture)

describeCounterContract("MemoryCounter", () => new MemoryCounter())
