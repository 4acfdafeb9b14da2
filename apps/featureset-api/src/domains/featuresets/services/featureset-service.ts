import type { TimeSource } from "@featurekit/clock"
import type { IdGenerator } from "@featurekit/id"
import type { Logger } from "@featurekit/logger"
import type { ObjectRef, StorageBucket } from "@featurekit/storage"
import type { DatasetId, ProjectService } from "../../projects"
import { FeaturesetError } from "../model/featureset.errors"
import type {
  FeaturesetId,
  FeaturesetRecord,
  PendingFeatureset,
} from "../model/featureset.model"
import { selectFeatures } from "../toolkit/catalog"
import type { FeaturesetRepository } from "./featureset-repository"
import type { FeaturizationPipeline } from "./featurization-pipeline"
import type { FeaturizationWatcher } from "./featurization-watcher"

export type FeaturesetServiceDeps = {
  clock: TimeSource
  logger: Logger
  ids: IdGenerator
  featuresets: FeaturesetRepository
  projectService: ProjectService
  pipeline: FeaturizationPipeline
  watcher: FeaturizationWatcher
  featuresBucket: StorageBucket
}

export type SubmitFeaturesetInput = {
  name: string
  datasetId: DatasetId

  /** Feature flags keyed by feature name; only catalog features with a truthy flag count. */
  selection: Readonly<Record<string, unknown>>
}

export class FeaturesetService {
  constructor(private readonly deps: FeaturesetServiceDeps) {}

  /**
   * Starts the computation and records it as pending. The record is returned
   * before the computation finishes; the watcher settles it later.
   */
  async submit(principal: string, input: SubmitFeaturesetInput): Promise<PendingFeatureset> {
    const features = selectFeatures(input.selection)
    if (features.length === 0) throw FeaturesetError.noFeaturesSelected()

    const dataset = await this.deps.projectService.findOwnedDataset(principal, input.datasetId)
    if (!dataset) throw FeaturesetError.accessDenied(input.datasetId)

    const artifact: ObjectRef = {
      bucket: this.deps.featuresBucket,
      key: `${this.deps.ids.generate()}_featureset.json`,
    }

    const { future, taskId } = this.deps.pipeline.submit({
      files: dataset.files,
      features,
      artifact,
    })

    let record: PendingFeatureset
    try {
      record = await this.deps.featuresets.create(
        {
          name: input.name,
          projectId: dataset.projectId,
          featuresList: features,
          fileUri: `${artifact.bucket}/${artifact.key}`,
          taskId,
        },
        this.deps.clock.now(),
      )
    } catch (err) {
      this.deps.watcher.abandon({ future, taskId })
      throw err
    }

    this.deps.watcher.watch({ future, record, principal })

    this.deps.logger.info("Featureset submitted", {
      principal,
      featuresetId: record.id,
      taskId,
      datasetId: dataset.id,
    })

    return record
  }

  /** Every featureset in the principal's projects, ordered by id. */
  async list(principal: string): Promise<FeaturesetRecord[]> {
    const projects = await this.deps.projectService.listProjects(principal)

    return this.deps.featuresets.listByProjects(projects.map((p) => p.id))
  }

  async findOwned(principal: string, id: FeaturesetId): Promise<FeaturesetRecord | null> {
    const record = await this.deps.featuresets.get(id)
    if (!record) return null

    const project = await this.deps.projectService.findOwnedProject(principal, record.projectId)

    return project ? record : null
  }

  async getOwned(principal: string, id: FeaturesetId): Promise<FeaturesetRecord> {
    const record = await this.findOwned(principal, id)
    if (!record) throw FeaturesetError.featuresetNotFound(id)

    return record
  }

  /** Does not stop a running computation; its watcher finds the record gone. */
  async delete(principal: string, id: FeaturesetId): Promise<void> {
    const record = await this.getOwned(principal, id)

    await this.deps.featuresets.delete(record.id)

    this.deps.logger.info("Featureset deleted", {
      principal,
      featuresetId: record.id,
      ...(record.status === "pending" && { taskId: record.taskId }),
    })
  }
}
