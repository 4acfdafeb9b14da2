import type { Milliseconds } from "@featurekit/clock"
import { type LogLevelName, logLevelNames } from "@featurekit/logger"
import { z } from "zod/mini"

export const storeDrivers = ["memory", "redis"] as const
export const storageDrivers = ["memory", "fs"] as const
export const imputeStrategies = ["constant", "mean", "median"] as const

export type StoreDriver = (typeof storeDrivers)[number]
export type StorageDriver = (typeof storageDrivers)[number]
export type ImputeStrategy = (typeof imputeStrategies)[number]

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Featureset API"),

  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(z.coerce.number(), 4700),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  SERVER_LIVENESS_PATH: z._default(z.string(), "/health/live"),
  SERVER_READINESS_PATH: z._default(z.string(), "/health/ready"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z._default(z.stringbool(), false),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  AUTH_PRINCIPAL_HEADER: z._default(z.string(), "x-user"),

  STORE_DRIVER: z._default(z.enum(storeDrivers), "memory"),
  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), "featurekit"),

  STORAGE_DRIVER: z._default(z.enum(storageDrivers), "memory"),
  STORAGE_ROOT_DIR: z._default(z.string(), "./var/storage"),
  FEATURES_BUCKET: z._default(z.string(), "features"),
  DATASETS_BUCKET: z._default(z.string(), "datasets"),

  WORKER_POOL_CONCURRENCY: z._default(z.coerce.number().check(z.multipleOf(1), z.positive()), 4),

  IMPUTE_STRATEGY: z._default(z.enum(imputeStrategies), "constant"),
  IMPUTE_MAX_VALUE: z._default(z.coerce.number(), 1e20),

  EVENTS_HEARTBEAT_MS: z._default(z.coerce.number().check(z.positive()), 15_000),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    livenessPath: string
    readinessPath: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  auth: {
    principalHeader: string
  }

  store: {
    driver: StoreDriver
  }

  redis: {
    url: string
    keyPrefix: string
  }

  storage: {
    driver: StorageDriver
    rootDir: string
    featuresBucket: string
    datasetsBucket: string
  }

  featurization: {
    concurrency: number
    impute: {
      strategy: ImputeStrategy
      maxValue: number
    }
  }

  events: {
    heartbeatMs: Milliseconds
  }
}
