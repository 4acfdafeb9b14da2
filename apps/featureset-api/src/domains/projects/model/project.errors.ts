import { BaseError } from "@featurekit/errors"
import type { DatasetId, ProjectId } from "./project.model"

export type ProjectErrorCode = "project_not_found" | "dataset_not_found"

export class ProjectError extends BaseError<ProjectErrorCode> {
  static projectNotFound(id: ProjectId | string): ProjectError {
    return new ProjectError(`Project ${id} not found`, {
      code: "project_not_found",
      context: { projectId: id },
    })
  }

  static datasetNotFound(id: DatasetId | string): ProjectError {
    return new ProjectError(`Dataset ${id} not found`, {
      code: "dataset_not_found",
      context: { datasetId: id },
    })
  }
}
