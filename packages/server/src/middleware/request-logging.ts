import type { Logger } from "@featurekit/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../server/server"
import type { PathString, ResolvedRequestLoggingConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

type RequestLoggingConfig = Extract<ResolvedRequestLoggingConfig, { enabled: true }>

/** One line per completed request; 5xx at error, the rest at the configured level. */
export function requestLoggingMiddleware(
  config: RequestLoggingConfig,
  base: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (isIgnored(path, config.ignorePaths)) {
      await next()
      return
    }

    const startedAt = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const route = isNonEmptyString(routePath(c)) ? routePath(c) : path
      const userAgent = c.req.header("user-agent")
      const principal = c.get("principal")

      const meta = {
        method: c.req.method,
        path,
        route,
        status,
        durationMs: Math.round(performance.now() - startedAt),
        ...(userAgent !== undefined && { userAgent }),
        ...(principal !== undefined && { principal }),
      }

      const logger = c.get("logger") ?? base

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function isIgnored(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
