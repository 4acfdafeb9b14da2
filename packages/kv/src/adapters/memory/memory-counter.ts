import type { Counter } from "../../ports/counter"
import type { KvKey } from "../../ports/kv-key"

export class MemoryCounter implements Counter {
  private readonly values = new Map<KvKey, number>()

  async increment(key: KvKey): Promise<number> {
    const next = (this.values.get(key) ?? 0) + 1
    this.values.set(key, next)

    return next
  }
}
