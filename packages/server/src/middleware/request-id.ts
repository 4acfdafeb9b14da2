import type { Context } from "hono"
import type { Middleware } from "../server/server"
import type { ResolvedRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

type RequestIdConfig = Extract<ResolvedRequestIdConfig, { enabled: true }>

const TRACE_ID = /^[0-9a-f]{32}$/i
const ZERO_TRACE_ID = /^0{32}$/

/** Trace id of a W3C `traceparent` value, or null when malformed or all zeros. */
export function traceIdFromTraceparent(traceparent: string): string | null {
  const traceId = traceparent.split("-")[1]

  if (traceId === undefined || !TRACE_ID.test(traceId) || ZERO_TRACE_ID.test(traceId)) {
    return null
  }

  return traceId.toLowerCase()
}

function resolveRequestId(c: Context, config: RequestIdConfig): string {
  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  if (config.fallbackToTraceparent) {
    const traceparent = c.req.header("traceparent")
    const traceId = traceparent ? traceIdFromTraceparent(traceparent) : null

    if (traceId) return traceId
  }

  return config.generate()
}

/**
 * Takes the request id from the configured header, else from `traceparent`
 * when enabled, else generates one. Echoes it on the response.
 */
export function requestIdMiddleware(config: RequestIdConfig): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)
    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header, requestId)
  }
}
