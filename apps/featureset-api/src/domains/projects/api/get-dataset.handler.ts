import type { Context, RequestHandler } from "@featurekit/server"
import { parseIdParam } from "../../../lib"
import type { ProjectServices } from "../composition"
import { ProjectError } from "../model/project.errors"

export function getDatasetHandler({ projectService }: ProjectServices): RequestHandler {
  return async (c: Context) => {
    const id = parseIdParam(c, ProjectError.datasetNotFound)

    const dataset = await projectService.getOwnedDataset(c.get("principal"), id)

    return c.json({ data: dataset })
  }
}
