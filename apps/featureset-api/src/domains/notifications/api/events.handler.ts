import type { Milliseconds, Sleeper } from "@featurekit/clock"
import type { Context, RequestHandler } from "@featurekit/server"
import { streamSSE } from "hono/streaming"
import type { FlowEvent } from "../model/flow-event.model"
import type { NotificationHub } from "../services/notification-hub"

export type EventsHandlerDeps = {
  hub: NotificationHub
  clock: Sleeper
  heartbeatMs: Milliseconds
}

type Wake = { kind: "event"; event: FlowEvent | null } | { kind: "heartbeat" }

/**
 * Server-sent event stream of the principal's flow events. Each event is sent
 * as `event: flow` with the JSON-encoded event as data. A comment line is
 * written whenever the stream has been idle for `heartbeatMs`.
 */
export function eventsHandler(deps: EventsHandlerDeps): RequestHandler {
  return (c: Context) => {
    const principal = c.get("principal")
    const logger = c.get("logger")

    return streamSSE(
      c,
      async (stream) => {
        const subscription = deps.hub.subscribe(principal)
        stream.onAbort(() => subscription.close())

        try {
          let pending = subscription.next()

          while (!stream.aborted) {
            const idle = new AbortController()

            const wake = await Promise.race<Wake>([
              pending.then((event): Wake => ({ kind: "event", event })),
              deps.clock
                .sleep(deps.heartbeatMs, idle.signal)
                .then((): Wake => ({ kind: "heartbeat" })),
            ])

            idle.abort()

            if (wake.kind === "heartbeat") {
              await stream.write(": heartbeat\n\n")
              continue
            }

            if (wake.event === null) break

            await stream.writeSSE({ event: "flow", data: JSON.stringify(wake.event) })
            pending = subscription.next()
          }
        } finally {
          subscription.close()
        }
      },
      async (err) => {
        logger.warn("Event stream failed", { principal, err })
      },
    )
  }
}
