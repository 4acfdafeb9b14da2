import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@featurekit/clock"
import type { Logger, LogLevelName } from "@featurekit/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/error-formatter"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /**
   * Use the trace id of a W3C `traceparent` header when the request id header is absent.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths when health routes are enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health/live" */
  livenessPath?: PathString

  /** @default "/health/ready" */
  readinessPath?: PathString

  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default no deadline */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorHandling

  routes: (app: Application) => void

  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>
export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>
export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

// Largest delay setTimeout accepts.
const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLoggingLevel: LogLevelName
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLoggingLevel: "info",
  health: {
    enabled: true,
    livenessPath: "/health/live",
    readinessPath: "/health/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealth(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestId(options.requestId),
    requestLogging: resolveRequestLogging(options.requestLogging, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealth(config: HealthConfig | undefined): ResolvedHealthConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    livenessPath: config?.livenessPath ?? DEFAULTS.health.livenessPath,
    readinessPath: config?.readinessPath ?? DEFAULTS.health.readinessPath,
    readinessChecks: config?.readinessChecks ?? [],
    checkTimeoutMs: config?.checkTimeoutMs ?? DEFAULTS.health.checkTimeoutMs,
  }
}

function resolveRequestId(config: RequestIdConfig | undefined): ResolvedRequestIdConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    header: config?.header ?? DEFAULTS.requestId.header,
    fallbackToTraceparent:
      config?.fallbackToTraceparent ?? DEFAULTS.requestId.fallbackToTraceparent,
    generate: config?.generate ?? DEFAULTS.requestId.generate,
  }
}

function resolveRequestLogging(
  config: RequestLoggingConfig | undefined,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: config?.level ?? DEFAULTS.requestLoggingLevel,
    ignorePaths:
      config?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
