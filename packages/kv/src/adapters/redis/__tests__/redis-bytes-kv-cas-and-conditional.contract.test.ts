import { FakeClock } from "@featurekit/clock"
import { describeCounterContract } from "../../../ports/__tests__/counter.contract"
import { describeKvCasAndConditionalContract } from "../../../ports/__tests__/kv-cas-and-conditional.contract"
import { describeKvStoreContract } from "../../../ports/__tests__/kv-store.contract"
import { FakeRedisClient } from "../../../tests/utils/fake-redis-client"
import { RedisBytesKeyValueStoreCasConditional } from "../redis-bytes-kv-cas-and-conditional"
import { RedisCounter } from "../redis-counter"

const createFixture = () => {
  const clock = new FakeClock(1_000)
  const client = new FakeRedisClient(clock)

  return {
    clock,
    store: new RedisBytesKeyValueStoreCasConditional(
      { client },
      { batchSize: 2, keyspacePrefix: "test:" },
    ),
  }
}

describeKvStoreContract("RedisBytesKeyValueStoreCasConditional", createFixture)
describeKvCasAndConditionalContract("RedisBytesKeyValueStoreCasConditional", createFixture)

describeCounterContract(
  "RedisCounter",
  () => new RedisCounter({ client: new FakeRedisClient(new FakeClock()) }, { keyspacePrefix: "test:" }),
)
