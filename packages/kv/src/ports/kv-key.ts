/**
 * Represents a key in the KV store.
 *
 * @remarks
 * Keys are typically namespaced strings (e.g., "featuresets:12", "counters:projects").
 */
export type KvKey = string

/** Prepended to every key by adapters that share a backend, e.g. "featurekit:". */
export type KeyspacePrefix = string
