import type { FlowEvent } from "../model/flow-event.model"

/**
 * Pushes events to a principal's live connections.
 *
 * @remarks
 * Fire-and-forget. Delivery is best effort and an event for a principal with
 * no open connection is dropped.
 */
export interface NotificationEmitter {
  emit(principal: string, event: FlowEvent): void
}
