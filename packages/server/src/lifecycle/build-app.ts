import { Hono } from "hono"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  options: ResolvedServerOptions
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Order: default middleware, health routes, `pre` middleware, app routes,
 * `post` middleware. Health routes still get a request id and a logger.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { options } = ctx
  const app: Application = new Hono()

  use(app, ctx.defaultMiddleware)

  if (options.health.enabled) {
    registerHealthRoutes(app, options.health, ctx.isReady)
  }

  use(app, options.middleware.pre)
  options.routes(app)
  use(app, options.middleware.post)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function use(app: Application, middleware: Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
