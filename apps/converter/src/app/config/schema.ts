import type { Milliseconds } from "@stillframe/clock"
import { type LogLevelName, logLevelNames } from "@stillframe/logger"
import { z } from "zod/mini"

/** Accepts a JSON boolean or an env-style string ("true", "0", "yes"...). */
const flag = z.union([z.boolean(), z.stringbool()])

const positiveInt = (max: number = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().check(z.multipleOf(1), z.gte(1), z.lte(max))

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "stillframe"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(flag, false),
  LOG_FILE: z.optional(z.string()),

  MAX_CONCURRENT_CONVERSIONS: z._default(positiveInt(10), 2),
  SCHEDULER_POLL_MS: z._default(positiveInt(), 100),
  AUTO_CLEAR_ON_COMPLETE: z._default(flag, false),

  OUTPUT_DIR: z.nullish(z.string()),
  OUTPUT_FILENAME_TEMPLATE: z._default(
    z.string().check(z.minLength(1)),
    "{original_name}_video",
  ),
  VIDEO_RESOLUTION: z._default(z.string().check(z.regex(/^\d+x\d+$/)), "1280x720"),
  VIDEO_FPS: z._default(positiveInt(120), 30),
  BACKGROUND_COLOR: z._default(z.string().check(z.regex(/^#[0-9a-fA-F]{6}$/)), "#000000"),

  QUICK_FILTER_MAX_BYTES: z._default(positiveInt(), 1024 ** 3),

  FFMPEG_PATH: z.optional(z.string()),
  FFPROBE_PATH: z.optional(z.string()),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
    file?: string
  }

  scheduler: {
    maxConcurrent: number
    pollIntervalMs: Milliseconds
    autoClearOnComplete: boolean
  }

  output: {
    directory?: string
    filenameTemplate: string
    resolution: string
    fps: number
    backgroundColor: string
  }

  validation: {
    maxBytes: number
  }

  ffmpeg: {
    ffmpegPath?: string
    ffprobePath?: string
  }
}
