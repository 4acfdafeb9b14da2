import type { Logger } from "@featurekit/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ErrorHandling } from "../server/server-options"
import { createErrorFormatter } from "./error-formatter"

export type ErrorHandler = HonoErrorHandler

/**
 * 5xx logs at error with the cause attached.
 * 4xx logs at info, with the cause only at debug.
 */
export function createErrorHandler(handling: ErrorHandling, logger: Logger): ErrorHandler {
  if (handling.kind === "handler") return handling.errorHandler

  const format = createErrorFormatter(handling.config)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const { status, code } = response.error

    const route = isNonEmptyString(routePath(c)) ? routePath(c) : c.req.path
    const log = c.get("logger") ?? logger
    const meta = { requestId, method: c.req.method, route, status, code }

    if (status >= 500) {
      log.error("Request failed", { ...meta, err })
    } else {
      log.info("Request failed", meta)
      log.debug("Request failure cause", { ...meta, err })
    }

    return c.json(response, status)
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler
