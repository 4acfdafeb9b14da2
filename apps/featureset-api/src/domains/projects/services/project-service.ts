import type { TimeSource } from "@featurekit/clock"
import type { IdGenerator } from "@featurekit/id"
import type { Logger } from "@featurekit/logger"
import type { StorageBucket, StoragePort } from "@featurekit/storage"
import { ProjectError } from "../model/project.errors"
import type {
  Dataset,
  DatasetFile,
  DatasetId,
  Project,
  ProjectId,
  UploadedSeries,
} from "../model/project.model"
import type { DatasetRepository } from "./dataset-repository"
import type { ProjectRepository } from "./project-repository"

export type ProjectServiceDeps = {
  clock: TimeSource
  logger: Logger
  ids: IdGenerator
  projects: ProjectRepository
  datasets: DatasetRepository
  storage: StoragePort
  datasetsBucket: StorageBucket
}

/**
 * Ownership rules for projects and the datasets inside them. Everything a
 * principal does not own is reported as missing.
 */
export class ProjectService {
  constructor(private readonly deps: ProjectServiceDeps) {}

  async createProject(principal: string, name: string): Promise<Project> {
    const project = await this.deps.projects.create(
      { name, ownerId: principal },
      this.deps.clock.now(),
    )

    this.deps.logger.info("Project created", { principal, projectId: project.id })

    return project
  }

  listProjects(principal: string): Promise<Project[]> {
    return this.deps.projects.listByOwner(principal)
  }

  async findOwnedProject(principal: string, id: ProjectId): Promise<Project | null> {
    const project = await this.deps.projects.get(id)

    return project?.ownerId === principal ? project : null
  }

  async getOwnedProject(principal: string, id: ProjectId): Promise<Project> {
    const project = await this.findOwnedProject(principal, id)
    if (!project) throw ProjectError.projectNotFound(id)

    return project
  }

  /** Stores each series under a fresh prefix in the datasets bucket, then records the dataset. */
  async createDataset(
    principal: string,
    projectId: ProjectId,
    input: { name: string; files: readonly UploadedSeries[] },
  ): Promise<Dataset> {
    const project = await this.getOwnedProject(principal, projectId)
    const prefix = this.deps.ids.generate()

    const files: DatasetFile[] = []

    for (const file of input.files) {
      const ref = { bucket: this.deps.datasetsBucket, key: `${prefix}/${file.name}` }

      await this.deps.storage.put(ref, Buffer.from(file.content, "utf8"), {
        contentType: "text/csv",
        ...(file.label !== undefined && { metadata: { label: file.label } }),
      })

      files.push({ name: file.name, ref })
    }

    const dataset = await this.deps.datasets.create(
      { projectId: project.id, name: input.name, files },
      this.deps.clock.now(),
    )

    this.deps.logger.info("Dataset created", {
      principal,
      projectId: project.id,
      datasetId: dataset.id,
      files: files.length,
    })

    return dataset
  }

  async findOwnedDataset(principal: string, id: DatasetId): Promise<Dataset | null> {
    const dataset = await this.deps.datasets.get(id)
    if (!dataset) return null

    const project = await this.findOwnedProject(principal, dataset.projectId)

    return project ? dataset : null
  }

  async getOwnedDataset(principal: string, id: DatasetId): Promise<Dataset> {
    const dataset = await this.findOwnedDataset(principal, id)
    if (!dataset) throw ProjectError.datasetNotFound(id)

    return dataset
  }
}
