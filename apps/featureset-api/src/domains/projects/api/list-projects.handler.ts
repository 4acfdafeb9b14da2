import type { Context, RequestHandler } from "@featurekit/server"
import type { ProjectServices } from "../composition"

export function listProjectsHandler({ projectService }: ProjectServices): RequestHandler {
  return async (c: Context) => {
    const projects = await projectService.listProjects(c.get("principal"))

    return c.json({ data: projects })
  }
}
