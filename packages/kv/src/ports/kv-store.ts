import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvResult } from "./kv-result"
import type { KvEntry } from "./kv-value"

/**
 * Authoritative key-value storage. Entries are never evicted; they leave the
 * store only when deleted or when their TTL runs out.
 */
export interface KeyValueStore<T> {
  get(key: KvKey): Promise<KvResult<T>>

  /** Overwrites an existing value. */
  set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void>

  /** Deleting a missing key is a no-op. */
  delete(key: KvKey): Promise<void>

  has(key: KvKey): Promise<boolean>

  /**
   * One result per distinct key. Adapters batch where the backend allows it.
   */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  /**
   * All entries share `opts`. Atomicity depends on the adapter.
   */
  setMany(entries: readonly KvEntry<T>[], opts?: Partial<KvSetOptions>): Promise<void>

  deleteMany(keys: readonly KvKey[]): Promise<void>
}
