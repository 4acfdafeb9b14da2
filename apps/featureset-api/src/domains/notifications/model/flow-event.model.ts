export const SHOW_NOTIFICATION = "app/SHOW_NOTIFICATION"
export const FETCH_FEATURESETS = "featuresets/FETCH_FEATURESETS"

export type NotificationPayload = {
  note: string
  type?: "error"
}

export type ShowNotificationEvent = {
  action: typeof SHOW_NOTIFICATION
  payload: NotificationPayload
}

export type FetchFeaturesetsEvent = {
  action: typeof FETCH_FEATURESETS
}

/** Out-of-band instruction for a connected client. */
export type FlowEvent = ShowNotificationEvent | FetchFeaturesetsEvent

export const FlowEvent = {
  note(note: string): ShowNotificationEvent {
    return { action: SHOW_NOTIFICATION, payload: { note } }
  },

  error(note: string): ShowNotificationEvent {
    return { action: SHOW_NOTIFICATION, payload: { note, type: "error" } }
  },

  fetchFeaturesets(): FetchFeaturesetsEvent {
    return { action: FETCH_FEATURESETS }
  },
}
