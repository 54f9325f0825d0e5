import { parseArgs } from "node:util"
import { BaseError } from "@stillframe/errors"
import type { ConfigOverrides } from "../app/config"

export type CliOptions = {
  files: string[]
  overrides: ConfigOverrides
  settingsFile?: string
  verbose: boolean
  help: boolean
}

export const usage = `Usage: stillframe [options] <file.mp3...>

Options:
  -o, --output-dir <dir>      write videos here instead of beside each input
  -c, --concurrency <n>       conversions to run at once (1-10)
  -r, --resolution <WxH>      video size, e.g. 1920x1080
      --fps <n>               frame rate
  -b, --background <#RRGGBB>  video colour
  -s, --settings <file.json>  settings file to load
  -v, --verbose               include technical details in errors
  -h, --help                  show this help`

export class UsageError extends BaseError<"usage"> {
  static invalidArguments(reason: string, cause?: unknown): UsageError {
    return new UsageError(reason, { code: "usage", cause, isOperational: true })
  }
}

/**
 * @throws {UsageError} on unknown options or missing option values
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof parse>

  try {
    parsed = parse(argv)
  } catch (err) {
    throw UsageError.invalidArguments(err instanceof Error ? err.message : String(err), err)
  }

  const { values, positionals } = parsed

  const overrides: ConfigOverrides = {
    ...(values["output-dir"] !== undefined && { OUTPUT_DIR: values["output-dir"] }),
    ...(values.concurrency !== undefined && { MAX_CONCURRENT_CONVERSIONS: values.concurrency }),
    ...(values.resolution !== undefined && { VIDEO_RESOLUTION: values.resolution }),
    ...(values.fps !== undefined && { VIDEO_FPS: values.fps }),
    ...(values.background !== undefined && { BACKGROUND_COLOR: values.background }),
  }

  return {
    files: positionals,
    overrides,
    ...(values.settings !== undefined && { settingsFile: values.settings }),
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      "output-dir": { type: "string", short: "o" },
      concurrency: { type: "string", short: "c" },
      resolution: { type: "string", short: "r" },
      fps: { type: "string" },
      background: { type: "string", short: "b" },
      settings: { type: "string", short: "s" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  })
}
