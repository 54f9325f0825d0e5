import { type ConfigSource, EnvSource, JsonSource, loadConfig, ObjectSource } from "@stillframe/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export type ConfigOverrides = Partial<Record<keyof EnvConfig, string | number | boolean>>

export type LoadAppConfigOptions = {
  env: Record<string, string | undefined>
  /** Applied last, e.g. CLI flags */
  overrides?: ConfigOverrides
  /** Persisted settings, lowest precedence. Missing file is fine. */
  settingsFile?: string
  cwd?: string
}

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
      ...(env.LOG_FILE !== undefined && { file: env.LOG_FILE }),
    },
    scheduler: {
      maxConcurrent: env.MAX_CONCURRENT_CONVERSIONS,
      pollIntervalMs: env.SCHEDULER_POLL_MS,
      autoClearOnComplete: env.AUTO_CLEAR_ON_COMPLETE,
    },
    output: {
      ...(env.OUTPUT_DIR != null && env.OUTPUT_DIR !== "" && { directory: env.OUTPUT_DIR }),
      filenameTemplate: env.OUTPUT_FILENAME_TEMPLATE,
      resolution: env.VIDEO_RESOLUTION,
      fps: env.VIDEO_FPS,
      backgroundColor: env.BACKGROUND_COLOR,
    },
    validation: {
      maxBytes: env.QUICK_FILTER_MAX_BYTES,
    },
    ffmpeg: {
      ...(env.FFMPEG_PATH !== undefined && { ffmpegPath: env.FFMPEG_PATH }),
      ...(env.FFPROBE_PATH !== undefined && { ffprobePath: env.FFPROBE_PATH }),
    },
  }
}

export type LoadedAppSettings = {
  config: AppConfig
  /** Sources that supplied a value, e.g. `env`, `json:settings.json`, `object:cli` */
  sourcesUsed: string[]
  /** Keys in the settings file that no setting matches, typically typos */
  unknownSettings: string[]
}

export async function loadAppSettings(options: LoadAppConfigOptions): Promise<LoadedAppSettings> {
  const settings = new JsonSource({
    file: options.settingsFile ?? "settings.json",
    required: options.settingsFile !== undefined,
    keyCase: "upper-snake",
    ...(options.cwd !== undefined && { cwd: options.cwd }),
  })

  const sources: ConfigSource[] = [settings, new EnvSource({ env: options.env })]

  if (options.overrides) {
    sources.push(new ObjectSource(options.overrides, "cli"))
  }

  const result = await loadConfig({ schema: envSchema, sources })

  return {
    config: mapEnvToConfig(result.value),
    sourcesUsed: result.sourcesUsed(),
    unknownSettings: result.unknownKeys(settings.name),
  }
}

export async function loadAppConfig(options: LoadAppConfigOptions): Promise<AppConfig> {
  const { config } = await loadAppSettings(options)
  return config
}
