import { type Application, createRouter } from "@featurekit/server"
import { createFeaturesetsModule } from "../../domains/featuresets"
import { createNotificationsModule } from "../../domains/notifications"
import { createProjectsModule } from "../../domains/projects"
import type { AppConfig } from "../config"
import { principalMiddleware } from "../middleware/principal"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(
  app: Application,
  config: AppConfig,
  services: DomainServices,
): void {
  const apiV1Router = createRouter()

  apiV1Router.use("*", principalMiddleware({ header: config.auth.principalHeader }))

  const modules: ApiModule[] = [
    createProjectsModule({ projects: services.projects }),
    createFeaturesetsModule({ featuresets: services.featuresets }),
    createNotificationsModule({ notifications: services.notifications, config }),
  ]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName}`))
}

export type RegisterRoutesFn = typeof registerRoutes
