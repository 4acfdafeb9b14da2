export type DeepPartial<T> = {
  [P in keyof T]?: (T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]) | undefined
}

type PlainObject = Record<string, unknown>

/**
 * Returns a copy of `base` with `overrides` merged in. Object literals merge
 * recursively; anything else (arrays, class instances, functions) replaces the
 * base value. `undefined` overrides are skipped.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (!overrides || !isPlainObject(base) || !isPlainObject(overrides)) return base

  // merge() preserves base's shape for every key it copies
  return merge(base, overrides) as T
}

function merge(base: PlainObject, overrides: PlainObject): PlainObject {
  const out: PlainObject = { ...base }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue

    const current = out[key]
    out[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value
  }

  return out
}

function isPlainObject(value: unknown): value is PlainObject {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
