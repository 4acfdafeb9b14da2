import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"
import type { RedisBytesClient } from "./redis-client"

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Caller owns `connect()` and `quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  // The mapped client's overloaded command signatures are wider than RedisBytesClient.
  return createClient(options).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
