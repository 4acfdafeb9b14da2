import type { KeyValueStoreCasAndConditional } from "./kv-cas-and-conditional"
import type { KeyValueStore } from "./kv-store"

export type BytesKeyValueStore = KeyValueStore<Uint8Array>
export type BytesKeyValueStoreCasAndConditional = KeyValueStoreCasAndConditional<Uint8Array>
