import type { Counter, KeyValueStoreCas } from "@featurekit/kv"
import type { IdIndexStore } from "../../../lib"
import type { ProjectId } from "../../projects"
import { FEATURESET_COUNTER_KEY, featuresetKey, featuresetProjectIndexKey } from "../keyspace"
import type {
  CompletedFeatureset,
  CreateFeaturesetInput,
  FeaturesetId,
  FeaturesetRecord,
  PendingFeatureset,
} from "../model/featureset.model"

export type FeaturesetRepositoryDeps = {
  featuresetKv: KeyValueStoreCas<FeaturesetRecord>
  projectIndex: IdIndexStore
  counter: Counter
}

export type MarkCompletedResult =
  | { kind: "written"; record: CompletedFeatureset }
  | { kind: "not_found" }
  /** The record changed between the read and the write, e.g. a concurrent delete. */
  | { kind: "conflict" }

export class FeaturesetRepository {
  public constructor(private readonly deps: FeaturesetRepositoryDeps) {}

  async create(input: CreateFeaturesetInput, at: Date): Promise<PendingFeatureset> {
    const id = await this.deps.counter.increment(FEATURESET_COUNTER_KEY)
    const record: PendingFeatureset = {
      id,
      name: input.name,
      projectId: input.projectId,
      featuresList: [...input.featuresList],
      customFeaturesScript: null,
      fileUri: input.fileUri,
      status: "pending",
      taskId: input.taskId,
      finishedAt: null,
      createdAt: at,
      updatedAt: at,
    }

    await this.deps.featuresetKv.set(featuresetKey(id), record)
    try {
      await this.deps.projectIndex.add(featuresetProjectIndexKey(input.projectId), id)
    } catch (err) {
      await this.deps.featuresetKv.delete(featuresetKey(id))
      throw err
    }

    return record
  }

  async get(id: FeaturesetId): Promise<FeaturesetRecord | null> {
    const res = await this.deps.featuresetKv.get(featuresetKey(id))

    return res.kind === "found" ? res.value : null
  }

  /** Only writes over the version it read, so a record deleted meanwhile stays deleted. */
  async markCompleted(id: FeaturesetId, finishedAt: Date): Promise<MarkCompletedResult> {
    const key = featuresetKey(id)
    const current = await this.deps.featuresetKv.getVersioned(key)
    if (current.kind === "not_found") return { kind: "not_found" }

    const record: CompletedFeatureset = {
      ...current.value,
      status: "completed",
      taskId: "",
      finishedAt,
      updatedAt: finishedAt,
    }

    const res = await this.deps.featuresetKv.setIfVersion(key, record, current.version)

    switch (res.kind) {
      case "written":
        return { kind: "written", record }
      case "conflict":
        return { kind: "conflict" }
      case "not_found":
        return { kind: "not_found" }
    }
  }

  /** False when there was nothing to delete. */
  async delete(id: FeaturesetId): Promise<boolean> {
    const record = await this.get(id)
    if (!record) return false

    await this.deps.featuresetKv.delete(featuresetKey(id))
    await this.deps.projectIndex.remove(featuresetProjectIndexKey(record.projectId), id)

    return true
  }

  /** Ordered by id. */
  async listByProjects(projectIds: readonly ProjectId[]): Promise<FeaturesetRecord[]> {
    const ids = (
      await Promise.all(
        projectIds.map((projectId) =>
          this.deps.projectIndex.list(featuresetProjectIndexKey(projectId)),
        ),
      )
    ).flat()

    if (ids.length === 0) return []

    const entries = await this.deps.featuresetKv.getMany(ids.map(featuresetKey))
    const records: FeaturesetRecord[] = []

    for (const res of entries.values()) {
      if (res.kind === "found") records.push(res.value)
    }

    return records.sort((a, b) => a.id - b.id)
  }
}
