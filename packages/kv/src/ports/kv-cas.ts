import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvNotFound } from "./kv-result"
import type { KeyValueStore } from "./kv-store"

/**
 * Opaque version token issued by the backing store. Only compare it through
 * `setIfVersion`.
 */
export type KvVersion = string

export type KvFoundVersioned<T> = {
  readonly kind: "found"
  readonly value: T
  readonly version: KvVersion
}

export type KvResultVersioned<T> = KvFoundVersioned<T> | KvNotFound

export type KvCasResult =
  | { readonly kind: "written"; readonly version: KvVersion }
  | { readonly kind: "conflict" }
  | { readonly kind: "not_found" }

/**
 * Compare-and-swap on top of {@link KeyValueStore}, for read-modify-write
 * cycles with more than one writer.
 *
 * @remarks
 * Every write, plain `set` included, issues a new version. Adapters must check
 * and write in one atomic step of the backend.
 */
export interface KeyValueStoreCas<T> extends KeyValueStore<T> {
  getVersioned(key: KvKey): Promise<KvResultVersioned<T>>

  /**
   * Writes only while the stored version still equals `expectedVersion`.
   * `not_found` means the key was deleted after it was read.
   */
  setIfVersion(
    key: KvKey,
    value: T,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult>
}
