export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig, ImputeStrategy, StorageDriver, StoreDriver } from "./schema"
