import type { Clock } from "@featurekit/clock"
import type { CoreServices } from "../../../app/services/core"
import { NotificationHub } from "../services/notification-hub"

export type NotificationServices = {
  clock: Clock
  hub: NotificationHub
}

export function createNotificationServices(core: CoreServices): NotificationServices {
  return {
    clock: core.clock,
    hub: new NotificationHub({ logger: core.logger, ids: core.ids }),
  }
}
