export { createNotificationsModule } from "./api"
export { createNotificationServices, type NotificationServices } from "./composition"
export { FETCH_FEATURESETS, FlowEvent, SHOW_NOTIFICATION } from "./model/flow-event.model"
export type { NotificationEmitter } from "./services/notification-emitter"
export { NotificationHub } from "./services/notification-hub"
