export {
  MemoryBytesKeyValueStoreCasConditional,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-cas-and-conditional"
export { MemoryCounter } from "./adapters/memory/memory-counter"
export { createRedisClient, type RedisBytesClientOptions } from "./adapters/redis/create"
export {
  RedisBytesKeyValueStoreCasConditional,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-bytes-kv-cas-and-conditional"
export type { RedisBytesClient } from "./adapters/redis/redis-client"
export { RedisCounter } from "./adapters/redis/redis-counter"
export {
  CodecKeyValueStoreCasConditional,
  createCodecKeyValueStoreCasConditional,
} from "./core/codec/codec-kv-cas-and-conditional"
export { CodecKeyValueStore, createCodecKeyValueStore } from "./core/codec/codec-kv-store"
export type { BytesKeyValueStore, BytesKeyValueStoreCasAndConditional } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { Counter } from "./ports/counter"
export type { KeyValueStoreCas, KvCasResult, KvResultVersioned, KvVersion } from "./ports/kv-cas"
export type { KeyValueStoreCasAndConditional } from "./ports/kv-cas-and-conditional"
export type { KeyValueStoreConditional, KvWriteResult } from "./ports/kv-conditional"
export type { KeyspacePrefix, KvKey } from "./ports/kv-key"
export type { KvSetOptions, KvTtl } from "./ports/kv-options"
export type { KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
export type { KvEntry } from "./ports/kv-value"
