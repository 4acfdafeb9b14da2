import path from "node:path"
import {
  type BytesKeyValueStoreCasAndConditional,
  type Counter,
  createRedisClient,
  MemoryBytesKeyValueStoreCasConditional,
  MemoryCounter,
  type RedisBytesClient,
  RedisBytesKeyValueStoreCasConditional,
  RedisCounter,
} from "@featurekit/kv"
import { createFsStorage, createMemoryStorage, type StoragePort } from "@featurekit/storage"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  /** Created lazily; connected by the start hook only when the store driver is redis. */
  redisClient: RedisBytesClient
  bytesStore: BytesKeyValueStoreCasAndConditional
  counter: Counter
  objectStorage: StoragePort
}

export function createDefaultInfraClients(
  config: AppConfig,
  core: CoreServices,
): InfraClients {
  const redisClient = createRedisClient({ url: config.redis.url })
  const keyspacePrefix = `${config.redis.keyPrefix}:`

  const { bytesStore, counter } =
    config.store.driver === "redis"
      ? {
          bytesStore: new RedisBytesKeyValueStoreCasConditional(
            { client: redisClient },
            { batchSize: 100, keyspacePrefix },
          ),
          counter: new RedisCounter({ client: redisClient }, { keyspacePrefix }),
        }
      : {
          bytesStore: new MemoryBytesKeyValueStoreCasConditional({ clock: core.clock }),
          counter: new MemoryCounter(),
        }

  const objectStorage =
    config.storage.driver === "fs"
      ? createFsStorage({ rootDir: path.resolve(config.storage.rootDir) })
      : createMemoryStorage({ clock: core.clock })

  return { redisClient, bytesStore, counter, objectStorage }
}
