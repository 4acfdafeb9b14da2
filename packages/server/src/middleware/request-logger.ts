import type { Logger } from "@featurekit/logger"
import type { Middleware } from "../server/server"

/** Binds a per-request child logger under `logger`. */
export function requestLoggerMiddleware(base: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", requestId ? base.child({ requestId }) : base)

    await next()
  }
}
