import {
  createCodecKeyValueStore,
  createCodecKeyValueStoreCasConditional,
} from "@featurekit/kv"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createJsonCodec, type IdIndex, IdIndexStore } from "../../../lib"
import type { Dataset, Project } from "../model/project.model"
import { DatasetRepository } from "../services/dataset-repository"
import { ProjectRepository } from "../services/project-repository"
import { ProjectService } from "../services/project-service"

export type ProjectServices = {
  projects: ProjectRepository
  datasets: DatasetRepository
  projectService: ProjectService
}

export function createProjectServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): ProjectServices {
  const projectKv = createCodecKeyValueStore<Project>({
    bytesStore: infra.bytesStore,
    codec: createJsonCodec<Project>(),
  })

  const datasetKv = createCodecKeyValueStore<Dataset>({
    bytesStore: infra.bytesStore,
    codec: createJsonCodec<Dataset>(),
  })

  const ownerIndex = new IdIndexStore({
    indexKv: createCodecKeyValueStoreCasConditional<IdIndex>({
      bytesStore: infra.bytesStore,
      codec: createJsonCodec<IdIndex>(),
    }),
  })

  const projects = new ProjectRepository({ projectKv, ownerIndex, counter: infra.counter })
  const datasets = new DatasetRepository({ datasetKv, counter: infra.counter })

  const projectService = new ProjectService({
    clock: core.clock,
    logger: core.logger.child({ module: "projects" }),
    ids: core.ids,
    projects,
    datasets,
    storage: infra.objectStorage,
    datasetsBucket: config.storage.datasetsBucket,
  })

  return { projects, datasets, projectService }
}
