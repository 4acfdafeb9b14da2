import {
  createFeaturesetServices,
  type FeaturesetServices,
} from "../../domains/featuresets"
import {
  createNotificationServices,
  type NotificationServices,
} from "../../domains/notifications"
import { createProjectServices, type ProjectServices } from "../../domains/projects"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  notifications: NotificationServices
  projects: ProjectServices
  featuresets: FeaturesetServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  const notifications = createNotificationServices(core)
  const projects = createProjectServices(config, core, infra)
  const featuresets = createFeaturesetServices(config, core, infra, { projects, notifications })

  return { notifications, projects, featuresets }
}
