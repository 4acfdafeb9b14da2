import type { Logger } from "@featurekit/logger"
import type { Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

export function createDefaultMiddleware(
  options: Pick<ResolvedServerOptions, "requestId" | "requestLogging">,
  logger: Logger,
): Middleware[] {
  return [
    ...(options.requestId.enabled ? [requestIdMiddleware(options.requestId)] : []),
    requestLoggerMiddleware(logger),
    ...(options.requestLogging.enabled
      ? [requestLoggingMiddleware(options.requestLogging, logger)]
      : []),
  ]
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
