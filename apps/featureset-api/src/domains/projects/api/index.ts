import { type Application, createRouter } from "@featurekit/server"
import type { ProjectServices } from "../composition"
import { createDatasetHandler } from "./create-dataset.handler"
import { createProjectHandler } from "./create-project.handler"
import { getDatasetHandler } from "./get-dataset.handler"
import { listProjectsHandler } from "./list-projects.handler"

type ProjectsModuleDeps = {
  projects: ProjectServices
}

export function createProjectsModule(deps: ProjectsModuleDeps) {
  return {
    name: "projects",
    register: (api: Application) => {
      const projects = createRouter()

      projects.get("/", listProjectsHandler(deps.projects))
      projects.post("/", createProjectHandler(deps.projects))
      projects.post("/:id/datasets", createDatasetHandler(deps.projects))

      const datasets = createRouter()

      datasets.get("/:id", getDatasetHandler(deps.projects))

      api.route("/projects", projects)
      api.route("/datasets", datasets)
    },
  }
}
