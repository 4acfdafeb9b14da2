import { type Application, createRouter } from "@featurekit/server"
import type { AppConfig } from "../../../app/config"
import type { NotificationServices } from "../composition"
import { eventsHandler } from "./events.handler"

type NotificationsModuleDeps = {
  config: AppConfig
  notifications: NotificationServices
}

export function createNotificationsModule(deps: NotificationsModuleDeps) {
  return {
    name: "notifications",
    register: (api: Application) => {
      const events = createRouter()

      events.get(
        "/",
        eventsHandler({
          hub: deps.notifications.hub,
          clock: deps.notifications.clock,
          heartbeatMs: deps.config.events.heartbeatMs,
        }),
      )

      api.route("/events", events)
    },
  }
}
