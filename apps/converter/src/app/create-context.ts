import { type AppConfig, type ConfigOverrides, loadAppSettings } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type AppServices, createDefaultDomainServices, type DomainOverrides } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"

export type AppContextOptions = {
  env?: Record<string, string | undefined>
  /** Highest-precedence settings, keyed like the environment */
  configOverrides?: ConfigOverrides
  /** Settings file to read; `settings.json` in the working directory when omitted */
  settingsFile?: string
  cwd?: string
  coreOverrides?: Partial<CoreServices>
  domainOverrides?: DomainOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

/**
 * @throws {ConfigError} when the settings do not validate
 * @throws {ConversionError} `transcoder_unavailable` when ffmpeg is missing
 */
export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const { config, sourcesUsed, unknownSettings } = await loadAppSettings({
    env: options.env ?? process.env,
    ...(options.configOverrides !== undefined && { overrides: options.configOverrides }),
    ...(options.settingsFile !== undefined && { settingsFile: options.settingsFile }),
    ...(options.cwd !== undefined && { cwd: options.cwd }),
  })

  const core = createCoreServices(config, options.coreOverrides)

  core.logger.debug("Settings loaded", { sources: sourcesUsed })
  if (unknownSettings.length > 0) {
    core.logger.warn("Ignoring unknown settings", { keys: unknownSettings })
  }

  const domains = await createDefaultDomainServices(config, core, options.domainOverrides)

  return {
    config,
    services: { core, domains },
    createStartHooks,
    createStopHooks,
  }
}
