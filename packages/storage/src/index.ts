export {
  type CreateFsStorageOptions,
  type CreateMemoryStorageOptions,
  createFsStorage,
  createMemoryStorage,
} from "./adapters/create"
export { FileSystemStorage, type FsStorageOptions } from "./adapters/fs-storage"
export { MemoryStorage } from "./adapters/memory-storage"
export { md5Etag, readAll, toBuffer } from "./core/bytes"
export { readText, type TextObject } from "./core/read-object"
export type { StoragePort } from "./ports/storage"
export type {
  Bytes,
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./ports/storage-object"
export type { ListOptions, PutOptions } from "./ports/storage-options"
