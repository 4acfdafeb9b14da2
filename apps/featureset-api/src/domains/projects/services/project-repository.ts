import type { Counter, KeyValueStore } from "@featurekit/kv"
import type { IdIndexStore } from "../../../lib"
import { PROJECT_COUNTER_KEY, projectKey, projectOwnerIndexKey } from "../keyspace"
import type { CreateProjectInput, Project, ProjectId } from "../model/project.model"

export type ProjectRepositoryDeps = {
  projectKv: KeyValueStore<Project>
  ownerIndex: IdIndexStore
  counter: Counter
}

export class ProjectRepository {
  public constructor(private readonly deps: ProjectRepositoryDeps) {}

  async create(input: CreateProjectInput, at: Date): Promise<Project> {
    const id = await this.deps.counter.increment(PROJECT_COUNTER_KEY)
    const project: Project = { id, name: input.name, ownerId: input.ownerId, createdAt: at }

    await this.deps.projectKv.set(projectKey(id), project)
    try {
      await this.deps.ownerIndex.add(projectOwnerIndexKey(input.ownerId), id)
    } catch (err) {
      await this.deps.projectKv.delete(projectKey(id))
      throw err
    }

    return project
  }

  async get(id: ProjectId): Promise<Project | null> {
    const res = await this.deps.projectKv.get(projectKey(id))

    return res.kind === "found" ? res.value : null
  }

  /** Ordered by id. */
  async listByOwner(ownerId: string): Promise<Project[]> {
    const ids = await this.deps.ownerIndex.list(projectOwnerIndexKey(ownerId))
    const entries = await this.deps.projectKv.getMany(ids.map(projectKey))

    const projects: Project[] = []

    for (const res of entries.values()) {
      if (res.kind === "found") projects.push(res.value)
    }

    return projects.sort((a, b) => a.id - b.id)
  }
}
