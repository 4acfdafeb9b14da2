import { createCodecKeyValueStoreCasConditional } from "@featurekit/kv"
import { LocalWorkerPool } from "@featurekit/taskgraph"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createJsonCodec, type IdIndex, IdIndexStore } from "../../../lib"
import type { NotificationServices } from "../../notifications"
import type { ProjectServices } from "../../projects"
import type { FeaturesetRecord } from "../model/featureset.model"
import { FeaturesetRepository } from "../services/featureset-repository"
import { FeaturesetService } from "../services/featureset-service"
import { FeaturizationPipeline } from "../services/featurization-pipeline"
import { FeaturizationWatcher } from "../services/featurization-watcher"

export type FeaturesetServices = {
  featuresets: FeaturesetRepository
  pool: LocalWorkerPool
  pipeline: FeaturizationPipeline
  watcher: FeaturizationWatcher
  featuresetService: FeaturesetService
}

export type FeaturesetCollaborators = {
  projects: ProjectServices
  notifications: NotificationServices
}

export function createFeaturesetServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  { projects, notifications }: FeaturesetCollaborators,
): FeaturesetServices {
  const featuresetKv = createCodecKeyValueStoreCasConditional<FeaturesetRecord>({
    bytesStore: infra.bytesStore,
    codec: createJsonCodec<FeaturesetRecord>(),
  })

  const projectIndex = new IdIndexStore({
    indexKv: createCodecKeyValueStoreCasConditional<IdIndex>({
      bytesStore: infra.bytesStore,
      codec: createJsonCodec<IdIndex>(),
    }),
  })

  const featuresets = new FeaturesetRepository({
    featuresetKv,
    projectIndex,
    counter: infra.counter,
  })

  const pool = new LocalWorkerPool(
    { logger: core.logger.child({ module: "worker-pool" }), ids: core.ids },
    { concurrency: config.featurization.concurrency },
  )

  const pipeline = new FeaturizationPipeline(
    { pool, storage: infra.objectStorage, clock: core.clock, logger: core.logger },
    { impute: config.featurization.impute },
  )

  const watcher = new FeaturizationWatcher({
    featuresets,
    notifications: notifications.hub,
    storage: infra.objectStorage,
    clock: core.clock,
    logger: core.logger,
  })

  const featuresetService = new FeaturesetService({
    clock: core.clock,
    logger: core.logger.child({ module: "featuresets" }),
    ids: core.ids,
    featuresets,
    projectService: projects.projectService,
    pipeline,
    watcher,
    featuresBucket: config.storage.featuresBucket,
  })

  return { featuresets, pool, pipeline, watcher, featuresetService }
}
