import type { Clock, UnixMs } from "@featurekit/clock"
import type { BytesKeyValueStoreCasAndConditional } from "../../ports/bytes-kv-store"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"

export type MemoryKvStoreOptions = {
  /**
   * Upper bound on live entries. Writing a new key past the bound throws.
   */
  maxEntries?: number
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

type MemoryEntry = {
  value: Uint8Array
  version: KvVersion
  expiresAtMs?: UnixMs
}

export class MemoryBytesKeyValueStoreCasConditional implements BytesKeyValueStoreCasAndConditional {
  private readonly entries = new Map<KvKey, MemoryEntry>()
  private lastVersion = 0

  public constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const entry = this.live(key)

    return entry ? { kind: "found", value: entry.value.slice() } : { kind: "not_found" }
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    this.write(key, value, this.live(key), opts)
  }

  async delete(key: KvKey): Promise<void> {
    this.entries.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.live(key) !== undefined
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of keys) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    for (const [key, value] of entries) {
      await this.set(key, value, opts)
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key)
    }
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<Uint8Array>> {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: entry.value.slice(), version: entry.version }
  }

  async setIfVersion(
    key: KvKey,
    value: Uint8Array,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    const entry = this.live(key)

    if (!entry) return { kind: "not_found" }
    if (entry.version !== expectedVersion) return { kind: "conflict" }

    return { kind: "written", version: this.write(key, value, entry, opts) }
  }

  async setIfNotExists(
    key: KvKey,
    value: Uint8Array,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    if (this.live(key)) return { kind: "skipped" }

    this.write(key, value, undefined, opts)

    return { kind: "written" }
  }

  private write(
    key: KvKey,
    value: Uint8Array,
    previous: MemoryEntry | undefined,
    opts?: Partial<KvSetOptions>,
  ): KvVersion {
    if (!previous) this.ensureCapacity()

    const expiresAtMs = opts?.ttl
      ? this.deps.clock.nowMs() + opts.ttl.milliseconds
      : previous?.expiresAtMs
    const version = String(++this.lastVersion)

    this.entries.set(key, {
      value: value.slice(),
      version,
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })

    return version
  }

  /** Returns the entry if present and unexpired, dropping it otherwise. */
  private live(key: KvKey): MemoryEntry | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.entries.delete(key)
      return undefined
    }

    return entry
  }

  private ensureCapacity(): void {
    const max = this.opts.maxEntries
    if (max === undefined || this.entries.size < max) return

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(key)
    }

    if (this.entries.size >= max) {
      throw new Error(`MemoryBytesKeyValueStoreCasConditional: max entries (${max}) exceeded`)
    }
  }

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAtMs !== undefined && this.deps.clock.nowMs() >= entry.expiresAtMs
  }
}
