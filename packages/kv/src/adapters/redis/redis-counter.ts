import type { Counter } from "../../ports/counter"
import type { KeyspacePrefix, KvKey } from "../../ports/kv-key"
import type { RedisBytesClient } from "./redis-client"

export type RedisCounterDeps = {
  client: RedisBytesClient
}

export type RedisCounterOptions = {
  keyspacePrefix: KeyspacePrefix
}

/** `INCR` is atomic, so concurrent callers never receive the same value. */
export class RedisCounter implements Counter {
  public constructor(
    private readonly deps: RedisCounterDeps,
    private readonly opts: RedisCounterOptions,
  ) {}

  async increment(key: KvKey): Promise<number> {
    return this.deps.client.incr(`${this.opts.keyspacePrefix}${key}`)
  }
}
