import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { Codec } from "../../ports/codec"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"
import type { KvEntry } from "../../ports/kv-value"

export type CodecKeyValueStoreDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStore
}

/**
 * Typed view over a bytes store. Several views with different codecs may
 * share one bytes store as long as their keys do not overlap.
 */
export class CodecKeyValueStore<T> implements KeyValueStore<T> {
  public constructor(private readonly deps: CodecKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    return this.decode(await this.deps.bytesStore.get(key))
  }

  async set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void> {
    await this.deps.bytesStore.set(key, this.deps.codec.encode(value), opts)
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.bytesStore.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.deps.bytesStore.has(key)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>> {
    const raw = await this.deps.bytesStore.getMany(keys)

    return new Map([...raw].map(([key, res]) => [key, this.decode(res)] as const))
  }

  async setMany(
    entries: readonly KvEntry<T>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    await this.deps.bytesStore.setMany(
      entries.map(([key, value]) => [key, this.deps.codec.encode(value)] as const),
      opts,
    )
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    await this.deps.bytesStore.deleteMany(keys)
  }

  private decode(res: KvResult<Uint8Array>): KvResult<T> {
    if (res.kind === "not_found") return res

    return { kind: "found", value: this.deps.codec.decode(res.value) }
  }
}

export function createCodecKeyValueStore<T>(
  deps: CodecKeyValueStoreDeps<T>,
): KeyValueStore<T> {
  return new CodecKeyValueStore<T>(deps)
}
