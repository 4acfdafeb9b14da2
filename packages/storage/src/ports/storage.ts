import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "./storage-object"
import type { ListOptions, PutOptions } from "./storage-options"

export interface StoragePort {
  /** Overwrites an existing object. */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void>

  head(ref: ObjectRef): Promise<StorageObjectMetadata | null>

  exists(ref: ObjectRef): Promise<boolean>

  get(ref: ObjectRef): Promise<StorageObject | null>

  /** No-op if the object does not exist. */
  delete(ref: ObjectRef): Promise<void>

  /** Objects in key order. */
  list(bucket: StorageBucket, options?: ListOptions): Promise<StorageObjectMetadata[]>
}
