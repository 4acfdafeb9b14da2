import type { Counter, KeyValueStore } from "@featurekit/kv"
import { DATASET_COUNTER_KEY, datasetKey } from "../keyspace"
import type { CreateDatasetInput, Dataset, DatasetId } from "../model/project.model"

export type DatasetRepositoryDeps = {
  datasetKv: KeyValueStore<Dataset>
  counter: Counter
}

export class DatasetRepository {
  public constructor(private readonly deps: DatasetRepositoryDeps) {}

  async create(input: CreateDatasetInput, at: Date): Promise<Dataset> {
    const id = await this.deps.counter.increment(DATASET_COUNTER_KEY)
    const dataset: Dataset = {
      id,
      projectId: input.projectId,
      name: input.name,
      files: input.files,
      createdAt: at,
    }

    await this.deps.datasetKv.set(datasetKey(id), dataset)

    return dataset
  }

  async get(id: DatasetId): Promise<Dataset | null> {
    const res = await this.deps.datasetKv.get(datasetKey(id))

    return res.kind === "found" ? res.value : null
  }
}
