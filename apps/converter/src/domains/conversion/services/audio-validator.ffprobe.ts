import fs from "node:fs/promises"
import path from "node:path"
import { errnoCode } from "@stillframe/errors"
import type { Logger } from "@stillframe/logger"
import ffmpeg, { type FfprobeData } from "fluent-ffmpeg"
import { ConversionError } from "../model/conversion.errors"
import { toConversionError } from "../model/error-catalog"
import type { AudioDescriptor } from "../model/media.model"
import type { AudioValidator } from "../model/validation.model"

type NumberLike = number | string | undefined

export type ProbeStream = {
  codec_type?: string
  sample_rate?: NumberLike
  channels?: number
  duration?: NumberLike
  bit_rate?: NumberLike
  tags?: Record<string, unknown>
}

export type ProbeData = {
  format: {
    duration?: NumberLike
    bit_rate?: NumberLike
    tags?: Record<string, unknown>
  }
  streams: ProbeStream[]
}

export type ProbeFn = (filePath: string) => Promise<ProbeData>

export function fluentProbe(ffprobePath?: string): ProbeFn {
  return (filePath) =>
    new Promise((resolve, reject) => {
      const command = ffmpeg(filePath)
      if (ffprobePath) command.setFfprobePath(ffprobePath)

      command.ffprobe((err: unknown, data: FfprobeData) => {
        if (err) reject(err)
        else resolve(data)
      })
    })
}

export type FfprobeAudioValidatorDeps = {
  logger: Logger
  probe: ProbeFn
}

export type FfprobeAudioValidatorConfig = {
  maxBytes: number
}

function toNumber(value: NumberLike): number | undefined {
  if (value === undefined || value === "" || value === "N/A") return undefined

  const n = typeof value === "number" ? value : Number(value)
  return Number.isFinite(n) ? n : undefined
}

function collectTags(...sources: Array<Record<string, unknown> | undefined>): Record<string, string> {
  const tags: Record<string, string> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(source ?? {})) {
      if (typeof value === "string" || typeof value === "number") {
        tags[key.toLowerCase()] ??= String(value)
      }
    }
  }

  return tags
}

/**
 * Filesystem checks followed by an ffprobe pass that fills in the descriptor.
 */
export class FfprobeAudioValidator implements AudioValidator {
  constructor(
    private readonly deps: FfprobeAudioValidatorDeps,
    private readonly config: FfprobeAudioValidatorConfig,
  ) {}

  async validate(filePath: string): Promise<AudioDescriptor> {
    const absolute = path.resolve(filePath)
    const sizeBytes = await this.checkFile(absolute)

    let data: ProbeData

    try {
      data = await this.deps.probe(absolute)
    } catch (err) {
      throw ConversionError.emptyOrCorrupt(absolute, "ffprobe could not read the file", err)
    }

    const audio = data.streams.find((s) => s.codec_type === "audio")

    if (!audio) {
      throw ConversionError.emptyOrCorrupt(absolute, "no audio stream")
    }

    const durationSeconds = toNumber(data.format.duration) ?? toNumber(audio.duration) ?? 0
    const bitRate = toNumber(data.format.bit_rate) ?? toNumber(audio.bit_rate)
    const sampleRate = toNumber(audio.sample_rate)

    const descriptor: AudioDescriptor = {
      path: absolute,
      filename: path.basename(absolute),
      sizeBytes,
      durationSeconds,
      ...(sampleRate !== undefined && { sampleRate }),
      ...(bitRate !== undefined && { bitrateKbps: Math.round(bitRate / 1000) }),
      ...(audio.channels !== undefined && { channels: audio.channels }),
      tags: collectTags(data.format.tags, audio.tags),
    }

    this.deps.logger.debug("Probed audio file", {
      inputPath: absolute,
      durationSeconds,
      sampleRate,
    })

    return descriptor
  }

  /** @returns the file size */
  private async checkFile(filePath: string): Promise<number> {
    let size: number

    try {
      const stats = await fs.stat(filePath)

      if (!stats.isFile()) throw ConversionError.invalidFormat(filePath, "not a regular file")
      size = stats.size
    } catch (err) {
      throw errnoCode(err) === "ENOENT"
        ? ConversionError.fileNotFound(filePath, err)
        : toConversionError(err)
    }

    if (path.extname(filePath).toLowerCase() !== ".mp3") {
      throw ConversionError.invalidFormat(filePath)
    }

    if (size === 0) throw ConversionError.emptyOrCorrupt(filePath, "file is empty")
    if (size > this.config.maxBytes) {
      throw ConversionError.tooLarge(filePath, size, this.config.maxBytes)
    }

    try {
      await fs.access(filePath, fs.constants.R_OK)
    } catch (err) {
      throw ConversionError.permissionDenied(filePath, err)
    }

    return size
  }
}
