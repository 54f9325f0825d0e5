export type LogContext = {
  service: string
  env: string
  component: string

  jobId: string
  inputPath: string
  outputPath: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields layered onto an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
