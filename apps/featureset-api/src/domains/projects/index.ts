export { createProjectsModule } from "./api"
export { createProjectServices, type ProjectServices } from "./composition"
export { ProjectError, type ProjectErrorCode } from "./model/project.errors"
export type { Dataset, DatasetFile, DatasetId, Project, ProjectId } from "./model/project.model"
export type { ProjectService } from "./services/project-service"
