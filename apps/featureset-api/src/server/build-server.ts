import { createServer, type PathString, type ReadinessCheck, type Server } from "@featurekit/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  server: Server
}

export function buildServer(ctx: AppContext): BuiltServer {
  const { config } = ctx
  const { core } = ctx.services

  const server = createServer(
    {
      clock: core.clock,
      logger: core.logger,
    },
    {
      host: config.server.host,
      port: config.server.port,
      shutdownTimeoutMs: config.server.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: {
          mappings: {
            validation_error: { status: 400, exposeContext: true },
            unauthenticated: { status: 401 },
            no_features_selected: { status: 400 },
            access_denied: { status: 403 },
            project_not_found: { status: 404 },
            dataset_not_found: { status: 404 },
            featureset_not_found: { status: 404 },
            not_implemented: { status: 501 },
            pool_closed: { status: 503, message: "Service is shutting down" },
            index_contention: { status: 503, message: "Too many concurrent changes, try again" },
          },
        },
      },

      requestId: {
        enabled: config.requestId.enabled,
        header: config.requestId.header,
        fallbackToTraceparent: config.requestId.fallbackToTraceparent,
      },

      requestLogging: {
        enabled: config.requestLogging.enabled,
        level: config.requestLogging.level,
      },

      health: {
        enabled: true,
        livenessPath: toPathString(config.server.livenessPath),
        readinessPath: toPathString(config.server.readinessPath),
        readinessChecks: createReadinessChecks(ctx),
      },

      routes: (app) => {
        ctx.registerRoutes(app, config, ctx.services.domains)
      },

      startHooks: ctx.createStartHooks(ctx),
      stopHooks: ctx.createStopHooks(ctx),
    },
  )

  return { server }
}

function createReadinessChecks(ctx: AppContext): ReadinessCheck[] {
  if (ctx.config.store.driver !== "redis") return []

  const { redisClient } = ctx.infra

  return [{ name: "redis", fn: async () => redisClient.isOpen }]
}

function toPathString(path: string): PathString {
  if (!path.startsWith("/")) throw new RangeError(`Health path must start with "/", got ${path}`)

  return `/${path.slice(1)}`
}
