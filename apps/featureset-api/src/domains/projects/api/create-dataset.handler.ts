import { type Context, parseOrThrow, type RequestHandler } from "@featurekit/server"
import { parseIdParam, readJsonBody } from "../../../lib"
import type { ProjectServices } from "../composition"
import { ProjectError } from "../model/project.errors"
import { createDatasetRequestSchema } from "./project.api.schema"

export function createDatasetHandler({ projectService }: ProjectServices): RequestHandler {
  return async (c: Context) => {
    const projectId = parseIdParam(c, ProjectError.projectNotFound)

    const request = parseOrThrow(createDatasetRequestSchema, await readJsonBody(c))

    const dataset = await projectService.createDataset(c.get("principal"), projectId, {
      name: request.name,
      files: request.files.map((file) => ({
        name: file.name,
        content: file.content,
        ...(file.label !== undefined && { label: file.label }),
      })),
    })

    return c.json({ data: dataset }, 201)
  }
}
