import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KeyValueStore } from "./kv-store"

export type KvWriteResult = { readonly kind: "written" } | { readonly kind: "skipped" }

/**
 * Conditional writes on top of {@link KeyValueStore}.
 *
 * @remarks
 * Adapters must check and write atomically; a read followed by a write does
 * not qualify.
 */
export interface KeyValueStoreConditional<T> extends KeyValueStore<T> {
  /** Skips the write when the key already holds a live value. */
  setIfNotExists(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<KvWriteResult>
}
