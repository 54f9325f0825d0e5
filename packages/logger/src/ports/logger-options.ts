import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for terminals. Leave off when logs go to a file
   * or another process.
   */
  prettify?: boolean
}
