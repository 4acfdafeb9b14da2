import type { KvKey } from "../../ports/kv-key"

export const bytes = {
  a: (): Uint8Array => new Uint8Array([1, 2, 3]),
  b: (): Uint8Array => new Uint8Array([9, 8, 7]),
  empty: (): Uint8Array => new Uint8Array([]),
}

export const keys = {
  one: (): KvKey => "k:one",
  two: (): KvKey => "k:two",
  three: (): KvKey => "k:three",
}
