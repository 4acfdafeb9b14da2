import type { KvKey } from "./kv-key"

/**
 * Monotonic integer sequences, one per key.
 *
 * @remarks
 * The first `increment` of a key returns 1. Values are never reused, even
 * after the entity that consumed one is deleted.
 */
export interface Counter {
  increment(key: KvKey): Promise<number>
}
