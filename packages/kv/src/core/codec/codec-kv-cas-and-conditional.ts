import type { BytesKeyValueStoreCasAndConditional } from "../../ports/bytes-kv-store"
import type { Codec } from "../../ports/codec"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KeyValueStoreCasAndConditional } from "../../ports/kv-cas-and-conditional"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import { CodecKeyValueStore } from "./codec-kv-store"

export type CodecKeyValueStoreCasConditionalDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStoreCasAndConditional
}

export class CodecKeyValueStoreCasConditional<T>
  extends CodecKeyValueStore<T>
  implements KeyValueStoreCasAndConditional<T>
{
  public constructor(private readonly casDeps: CodecKeyValueStoreCasConditionalDeps<T>) {
    super(casDeps)
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<T>> {
    const res = await this.casDeps.bytesStore.getVersioned(key)
    if (res.kind === "not_found") return res

    return { kind: "found", value: this.casDeps.codec.decode(res.value), version: res.version }
  }

  async setIfVersion(
    key: KvKey,
    value: T,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    return this.casDeps.bytesStore.setIfVersion(
      key,
      this.casDeps.codec.encode(value),
      expectedVersion,
      opts,
    )
  }

  async setIfNotExists(
    key: KvKey,
    value: T,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    return this.casDeps.bytesStore.setIfNotExists(key, this.casDeps.codec.encode(value), opts)
  }
}

export function createCodecKeyValueStoreCasConditional<T>(
  deps: CodecKeyValueStoreCasConditionalDeps<T>,
): KeyValueStoreCasAndConditional<T> {
  return new CodecKeyValueStoreCasConditional<T>(deps)
}
