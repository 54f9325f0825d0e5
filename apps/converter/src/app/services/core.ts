import { type Clock, SystemClock } from "@stillframe/clock"
import {
  createPinoLogger,
  fileDestination,
  type Logger,
  type PinoLoggerDeps,
  stderrDestination,
} from "@stillframe/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

/** Logs never share stdout with the progress output. */
export function logDestination(logging: AppConfig["logging"]): PinoLoggerDeps["destination"] {
  if (logging.file) return fileDestination(logging.file)
  // the pretty transport writes to stderr on its own
  if (logging.prettify) return undefined

  return stderrDestination()
}

export function createCoreServices(
  config: AppConfig,
  overrides: Partial<CoreServices> = {},
): CoreServices {
  const clock = overrides.clock ?? new SystemClock()
  const destination = overrides.logger ? undefined : logDestination(config.logging)

  const logger =
    overrides.logger ??
    createPinoLogger(
      destination ? { destination } : {},
      {
        level: config.logging.level,
        prettify: config.logging.prettify,
      },
      {
        service: config.logging.serviceName,
        env: config.app.env,
      },
    )

  return { clock, logger }
}
