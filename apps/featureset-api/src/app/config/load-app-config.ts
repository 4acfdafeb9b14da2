import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@featurekit/config"
import { applyOverrides, type DeepPartial } from "@featurekit/server"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    auth: {
      principalHeader: env.AUTH_PRINCIPAL_HEADER,
    },
    store: {
      driver: env.STORE_DRIVER,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    storage: {
      driver: env.STORAGE_DRIVER,
      rootDir: env.STORAGE_ROOT_DIR,
      featuresBucket: env.FEATURES_BUCKET,
      datasetsBucket: env.DATASETS_BUCKET,
    },
    featurization: {
      concurrency: env.WORKER_POOL_CONCURRENCY,
      impute: {
        strategy: env.IMPUTE_STRATEGY,
        maxValue: env.IMPUTE_MAX_VALUE,
      },
    },
    events: {
      heartbeatMs: env.EVENTS_HEARTBEAT_MS,
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({
    schema: envSchema,
    sources,
    expandEnv: true,
  })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
