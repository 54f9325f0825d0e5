export {
  type ConfigOverrides,
  type LoadAppConfigOptions,
  type LoadedAppSettings,
  loadAppConfig,
  loadAppSettings,
  mapEnvToConfig,
} from "./load-app-config"
export type { AppConfig, EnvConfig } from "./schema"
export { envSchema } from "./schema"
