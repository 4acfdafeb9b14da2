import { Readable } from "node:stream"
import type { Clock } from "@featurekit/clock"
import { md5Etag, toBuffer } from "../core/bytes"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type { ListOptions, PutOptions } from "../ports/storage-options"

interface StoredObject {
  data: Buffer
  etag: string
  lastModified: Date
  contentType?: string
  metadata?: Record<string, string>
}

export interface MemoryStorageDeps {
  clock: Clock
}

export class MemoryStorage implements StoragePort {
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, StoredObject>>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const buffer = await toBuffer(data)

    this.bucket(ref.bucket).set(ref.key, {
      data: buffer,
      etag: md5Etag(buffer),
      lastModified: this.deps.clock.now(),
      ...(options?.contentType && { contentType: options.contentType }),
      ...(options?.metadata && { metadata: { ...options.metadata } }),
    })
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const stored = this.buckets.get(ref.bucket)?.get(ref.key)

    return stored ? describe(ref.key, stored) : null
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return this.buckets.get(ref.bucket)?.has(ref.key) ?? false
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const stored = this.buckets.get(ref.bucket)?.get(ref.key)
    if (!stored) return null

    return {
      ...describe(ref.key, stored),
      body: Readable.from([Buffer.from(stored.data)]),
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.buckets.get(ref.bucket)?.delete(ref.key)
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<StorageObjectMetadata[]> {
    const objects = this.buckets.get(bucket)
    if (!objects) return []

    const prefix = options?.prefix ?? ""

    return [...objects]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, stored]) => describe(key, stored))
  }

  private bucket(name: StorageBucket): Map<StorageKey, StoredObject> {
    let objects = this.buckets.get(name)

    if (!objects) {
      objects = new Map()
      this.buckets.set(name, objects)
    }

    return objects
  }
}

function describe(key: StorageKey, stored: StoredObject): StorageObjectMetadata {
  return {
    key,
    sizeInBytes: stored.data.length,
    lastModified: stored.lastModified,
    etag: stored.etag,
    ...(stored.contentType && { contentType: stored.contentType }),
    ...(stored.metadata && { metadata: { ...stored.metadata } }),
  }
}
