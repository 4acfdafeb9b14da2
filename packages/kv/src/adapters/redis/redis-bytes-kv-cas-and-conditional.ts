import type { BytesKeyValueStoreCasAndConditional } from "../../ports/bytes-kv-store"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KeyspacePrefix, KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"
import type { RedisBytesClient, RedisEvalOptions } from "./redis-client"
import {
  GET_VERSIONED,
  SET_IF_NOT_EXISTS,
  SET_IF_VERSION,
  SET_WITH_VERSION,
} from "./redis-kv-scripts"

export type RedisKvStoreOptions = {
  /**
   * Keys per round trip for the bulk methods. Larger requests are split.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

export type RedisKvStoreDeps = {
  client: RedisBytesClient
}

const VERSION_NAMESPACE = "kv-version:"

/**
 * Every value key has a version key under `<prefix>kv-version:`, bumped by
 * each write in the same script that writes the value.
 */
export class RedisBytesKeyValueStoreCasConditional implements BytesKeyValueStoreCasAndConditional {
  public constructor(
    private readonly deps: RedisKvStoreDeps,
    private readonly opts: RedisKvStoreOptions,
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    return toResult(await this.deps.client.get(this.fullKey(key)))
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    await this.deps.client.eval(SET_WITH_VERSION, this.script(key, [toBuffer(value), ttlArg(opts)]))
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.client.del(this.keyPair(key))
  }

  async has(key: KvKey): Promise<boolean> {
    return (await this.deps.client.exists(this.fullKey(key))) === 1
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const batch of chunks([...new Set(keys)], this.opts.batchSize)) {
      const buffers = await this.deps.client.mGet(batch.map((k) => this.fullKey(k)))

      for (const [i, key] of batch.entries()) {
        out.set(key, toResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    const ttl = ttlArg(opts)

    for (const batch of chunks(entries, this.opts.batchSize)) {
      const tx = this.deps.client.multi()

      for (const [key, value] of batch) {
        tx.eval(SET_WITH_VERSION, this.script(key, [toBuffer(value), ttl]))
      }

      await tx.exec()
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const batch of chunks(keys, this.opts.batchSize)) {
      await this.deps.client.del(batch.flatMap((k) => this.keyPair(k)))
    }
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<Uint8Array>> {
    const reply = await this.deps.client.eval(GET_VERSIONED, this.script(key, []))

    if (reply === null) return { kind: "not_found" }
    if (!Array.isArray(reply)) throw unexpectedReply("GET_VERSIONED", reply)

    const [value, version]: unknown[] = reply
    if (!Buffer.isBuffer(value)) throw unexpectedReply("GET_VERSIONED", reply)

    return { kind: "found", value: new Uint8Array(value), version: replyText(version) }
  }

  async setIfVersion(
    key: KvKey,
    value: Uint8Array,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    const reply = replyText(
      await this.deps.client.eval(
        SET_IF_VERSION,
        this.script(key, [expectedVersion, toBuffer(value), ttlArg(opts)]),
      ),
    )

    if (reply === "not_found") return { kind: "not_found" }
    if (reply === "conflict") return { kind: "conflict" }

    return { kind: "written", version: reply }
  }

  async setIfNotExists(
    key: KvKey,
    value: Uint8Array,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    const reply = replyText(
      await this.deps.client.eval(SET_IF_NOT_EXISTS, this.script(key, [toBuffer(value), ttlArg(opts)])),
    )

    return reply === "written" ? { kind: "written" } : { kind: "skipped" }
  }

  private script(key: KvKey, args: (string | Buffer)[]): RedisEvalOptions {
    return { keys: this.keyPair(key), arguments: args }
  }

  private keyPair(key: KvKey): string[] {
    return [this.fullKey(key), `${this.opts.keyspacePrefix}${VERSION_NAMESPACE}${key}`]
  }

  private fullKey(key: KvKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }
}

function* chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}

function ttlArg(opts?: Partial<KvSetOptions>): string {
  return opts?.ttl ? String(opts.ttl.milliseconds) : ""
}

function toBuffer(value: Uint8Array): Buffer {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
}

function toResult(buffer: Buffer | null): KvResult<Uint8Array> {
  if (buffer === null) return { kind: "not_found" }

  return { kind: "found", value: new Uint8Array(buffer) }
}

function replyText(reply: unknown): string {
  if (typeof reply === "string") return reply
  if (Buffer.isBuffer(reply)) return reply.toString("utf8")

  throw unexpectedReply("script", reply)
}

function unexpectedReply(command: string, reply: unknown): Error {
  return new Error(`Unexpected Redis reply to ${command}: ${String(reply)}`)
}
