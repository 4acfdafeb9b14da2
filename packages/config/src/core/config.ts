import type { IConfig } from "../ports/config"

export class Config<T extends object> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
    private readonly sourceOrder: readonly string[] = [],
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const known = new Set(Object.keys(this.data))
    const used = Object.entries(this.provenance)
      .filter(([key, source]) => known.has(key) && source !== "default")
      .map(([, source]) => source)

    const usedSet = new Set(used)

    return this.sourceOrder.filter((name) => usedSet.has(name))
  }

  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.providedKeys].filter((k) => !known.has(k))
  }
}
