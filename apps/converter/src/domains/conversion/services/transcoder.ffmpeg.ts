import fs from "node:fs/promises"
import path from "node:path"
import type { Clock, Seconds } from "@stillframe/clock"
import type { Logger } from "@stillframe/logger"
import ffmpeg from "fluent-ffmpeg"
import { ConversionError } from "../model/conversion.errors"
import { formatResolution, type OutputSpec } from "../model/media.model"
import type {
  TranscodeOptions,
  TranscodeOutcome,
  TranscodeRequest,
  Transcoder,
} from "../model/transcoder.model"

export type FfmpegProgress = {
  /** `HH:MM:SS.ss` position reached in the output */
  timemark?: string
  percent?: number
}

/**
 * The slice of a fluent-ffmpeg command this adapter drives.
 */
export interface TranscodeCommand {
  input(source: string): TranscodeCommand
  inputFormat(format: string): TranscodeCommand
  inputOptions(options: string[]): TranscodeCommand
  outputOptions(options: string[]): TranscodeCommand
  output(target: string): TranscodeCommand
  on(event: string, listener: (...args: never[]) => void): TranscodeCommand
  run(): void
  kill(signal: string): unknown
  getAvailableFormats(callback: (err: Error | null, formats: unknown) => void): void
}

export type TranscodeCommandFactory = () => TranscodeCommand

export function fluentCommandFactory(ffmpegPath?: string): TranscodeCommandFactory {
  return () => {
    const command = ffmpeg()
    if (ffmpegPath) command.setFfmpegPath(ffmpegPath)
    return command
  }
}

export type FfmpegTranscoderDeps = {
  clock: Clock
  logger: Logger
  createCommand: TranscodeCommandFactory
}

export type FfmpegTranscoderConfig = {
  /** Lines of ffmpeg stderr kept for failure diagnostics */
  stderrTailLines: number
}

const TIMEMARK_PATTERN = /^(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/

export function parseTimemark(timemark: string): Seconds | undefined {
  const match = TIMEMARK_PATTERN.exec(timemark.trim())
  if (!match?.[1] || !match[2] || !match[3]) return undefined

  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3])
}

/** `#1a2b3c` -> `0x1a2b3c`, the form the lavfi colour source takes. */
export function toLavfiColor(color: string): string {
  return color.startsWith("#") ? `0x${color.slice(1)}` : color
}

export function colorSource(output: OutputSpec): string {
  return `color=c=${toLavfiColor(output.backgroundColor)}:s=${formatResolution(output.resolution)}:r=${output.fps}`
}

export function classifyFailure(
  err: Error,
  diagnostic: string,
  request: TranscodeRequest,
): ConversionError {
  const text = `${err.message}\n${diagnostic}`
  const inputPath = request.input.path

  if (/Cannot find ffmpeg/i.test(text)) return ConversionError.transcoderUnavailable(err)
  if (/No such file or directory/i.test(text)) return ConversionError.fileNotFound(inputPath, err)
  if (/Invalid data found|Header missing/i.test(text)) {
    return ConversionError.emptyOrCorrupt(inputPath, "unreadable audio stream", err)
  }
  if (/Permission denied/i.test(text)) return ConversionError.permissionDenied(inputPath, err)
  if (/No space left/i.test(text)) return ConversionError.diskSpaceLow(request.output.path, err)

  return ConversionError.transcodingFailed(
    diagnostic || err.message,
    { inputPath, outputPath: request.output.path },
    err,
  )
}

/**
 * Audio plus a solid-colour video track, via fluent-ffmpeg:
 *
 * ```
 * ffmpeg -i in.mp3 -f lavfi -t <duration> -i color=c=0x000000:s=1280x720:r=30 \
 *   -map 1:v:0 -map 0:a:0 -c:v libx264 -c:a aac -pix_fmt yuv420p -movflags +faststart \
 *   -shortest -y out.mp4
 * ```
 *
 * `-t` is left out when the duration is unknown (0).
 */
export class FfmpegTranscoder implements Transcoder {
  private availability?: Promise<boolean>

  constructor(
    private readonly deps: FfmpegTranscoderDeps,
    private readonly config: FfmpegTranscoderConfig = { stderrTailLines: 20 },
  ) {}

  isAvailable(): Promise<boolean> {
    this.availability ??= new Promise<boolean>((resolve) => {
      try {
        this.deps.createCommand().getAvailableFormats((err) => {
          if (err) this.deps.logger.warn("ffmpeg not available", { err })
          resolve(!err)
        })
      } catch (err) {
        this.deps.logger.warn("ffmpeg not available", { err })
        resolve(false)
      }
    })

    return this.availability
  }

  async convert(
    request: TranscodeRequest,
    options: TranscodeOptions,
  ): Promise<TranscodeOutcome> {
    const { output } = request

    if (options.signal.aborted) {
      return { kind: "failed", error: ConversionError.cancelled({ path: request.input.path }) }
    }

    const directory = path.dirname(output.path)

    try {
      await fs.mkdir(directory, { recursive: true })
    } catch (err) {
      return { kind: "failed", error: ConversionError.outputDirectoryInvalid(directory, err) }
    }

    const outcome = await this.run(request, options)
    if (outcome.kind === "failed") return outcome

    const sizeBytes = await this.outputSize(output.path)

    return {
      kind: "succeeded",
      outputPath: output.path,
      ...(sizeBytes !== undefined && { sizeBytes }),
    }
  }

  private run(request: TranscodeRequest, options: TranscodeOptions): Promise<TranscodeOutcome> {
    const { input, output } = request
    const { signal } = options
    const logger = this.deps.logger.child({ inputPath: input.path, outputPath: output.path })
    const startedAtMs = this.deps.clock.nowMs()
    const stderr: string[] = []

    return new Promise<TranscodeOutcome>((resolve) => {
      let settled = false

      const settle = (outcome: TranscodeOutcome) => {
        if (settled) return
        settled = true
        signal.removeEventListener("abort", onAbort)
        resolve(outcome)
      }

      const command = this.deps
        .createCommand()
        .input(input.path)
        .input(colorSource(output))
        .inputFormat("lavfi")

      // unknown duration: the colour source runs until -shortest cuts it at the audio's end
      if (input.durationSeconds > 0) {
        command.inputOptions(["-t", String(input.durationSeconds)])
      }

      command
        .outputOptions([
          "-map", "1:v:0",
          "-map", "0:a:0",
          "-c:v", "libx264",
          "-c:a", "aac",
          "-pix_fmt", "yuv420p",
          "-movflags", "+faststart",
          "-shortest",
          "-y",
        ])
        .output(output.path)
        .on("start", (commandLine: string) => {
          logger.debug("ffmpeg started", { commandLine })
        })
        .on("stderr", (line: string) => {
          stderr.push(line)
          if (stderr.length > this.config.stderrTailLines) stderr.shift()
        })
        .on("progress", (progress: FfmpegProgress) => {
          this.reportProgress(progress, input.durationSeconds, startedAtMs, options)
        })
        .on("end", () => {
          settle({ kind: "succeeded", outputPath: output.path })
        })
        .on("error", (err: Error) => {
          if (signal.aborted) return
          settle({ kind: "failed", error: classifyFailure(err, stderr.join("\n"), request) })
        })

      const onAbort = () => {
        logger.info("Killing ffmpeg after cancel")
        try {
          command.kill("SIGKILL")
        } catch (err) {
          logger.warn("Failed to kill ffmpeg", { err })
        }
        settle({ kind: "failed", error: ConversionError.cancelled({ path: input.path }) })
      }

      signal.addEventListener("abort", onAbort, { once: true })
      command.run()
    })
  }

  private reportProgress(
    progress: FfmpegProgress,
    durationSeconds: Seconds,
    startedAtMs: number,
    options: TranscodeOptions,
  ): void {
    const position = progress.timemark ? parseTimemark(progress.timemark) : undefined
    if (position === undefined || durationSeconds <= 0) return

    const percent = Math.min(100, (position / durationSeconds) * 100)
    const elapsedSeconds = (this.deps.clock.nowMs() - startedAtMs) / 1000

    if (percent <= 0) {
      options.onProgress(percent)
      return
    }

    options.onProgress(percent, (elapsedSeconds * (100 - percent)) / percent)
  }

  private async outputSize(outputPath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(outputPath)
      return stats.size
    } catch (err) {
      this.deps.logger.warn("Could not stat converted file", { outputPath, err })
      return undefined
    }
  }
}
