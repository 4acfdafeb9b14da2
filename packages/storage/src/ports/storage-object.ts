import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array

export type Bytes = number

/** Path-like key inside a bucket, e.g. "datasets/4/series_a.csv". */
export type StorageKey = string

export type StorageBucket = string

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export type StorageObjectMetadata = {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
  etag: string
  contentType?: string
  metadata?: Record<string, string>
}

export interface StorageObject extends StorageObjectMetadata {
  body: Readable
}
