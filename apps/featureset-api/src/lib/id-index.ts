import type { KeyValueStoreCasAndConditional, KvKey } from "@featurekit/kv"
import { IdIndexError } from "./id-index.errors"

export type IdIndex = {
  ids: number[]
}

export type IdIndexStoreDeps = {
  indexKv: KeyValueStoreCasAndConditional<IdIndex>
}

export type IdIndexStoreOptions = {
  /** @default 50 */
  maxAttempts?: number
}

type IdsChange = (ids: readonly number[]) => number[] | null

/**
 * Sorted id lists used to answer "all X owned by Y" without scanning the store.
 *
 * @remarks
 * Each change is a versioned read-modify-write, retried on conflict, so
 * concurrent writers to one list never drop each other's ids. A list that
 * empties is kept as `[]` rather than deleted: its version then only moves
 * forward.
 *
 * Index writes are not atomic with the record they point at. Readers must
 * tolerate ids whose record is gone.
 */
export class IdIndexStore {
  private readonly maxAttempts: number

  public constructor(
    private readonly deps: IdIndexStoreDeps,
    opts: IdIndexStoreOptions = {},
  ) {
    this.maxAttempts = opts.maxAttempts ?? 50
  }

  async list(key: KvKey): Promise<number[]> {
    const res = await this.deps.indexKv.get(key)

    return res.kind === "found" ? res.value.ids : []
  }

  async add(key: KvKey, id: number): Promise<void> {
    await this.update(key, (ids) =>
      ids.includes(id) ? null : [...ids, id].sort((a, b) => a - b),
    )
  }

  async remove(key: KvKey, id: number): Promise<void> {
    await this.update(key, (ids) =>
      ids.includes(id) ? ids.filter((existing) => existing !== id) : null,
    )
  }

  /** `change` returns null when the list needs no write. */
  private async update(key: KvKey, change: IdsChange): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const current = await this.deps.indexKv.getVersioned(key)

      if (current.kind === "not_found") {
        const ids = change([])
        if (ids === null) return

        const created = await this.deps.indexKv.setIfNotExists(key, { ids })
        if (created.kind === "written") return

        continue
      }

      const ids = change(current.value.ids)
      if (ids === null) return

      const written = await this.deps.indexKv.setIfVersion(key, { ids }, current.version)
      if (written.kind === "written") return
    }

    throw IdIndexError.contention(key, this.maxAttempts)
  }
}
