import { type Context, parseOrThrow, type RequestHandler } from "@featurekit/server"
import { readJsonBody } from "../../../lib"
import type { ProjectServices } from "../composition"
import { createProjectRequestSchema } from "./project.api.schema"

export function createProjectHandler({ projectService }: ProjectServices): RequestHandler {
  return async (c: Context) => {
    const { name } = parseOrThrow(createProjectRequestSchema, await readJsonBody(c))

    const project = await projectService.createProject(c.get("principal"), name)

    return c.json({ data: project }, 201)
  }
}
