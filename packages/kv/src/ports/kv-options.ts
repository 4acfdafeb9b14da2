import type { Milliseconds } from "@featurekit/clock"

type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export type KvTtl = MillisecondsTtl

export interface KvSetOptions {
  /**
   * Entry expiry. Omitting it on an overwrite keeps whatever TTL the key
   * already had.
   */
  readonly ttl?: KvTtl
}
