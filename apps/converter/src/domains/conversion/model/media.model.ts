import { ConversionError } from "./conversion.errors"

export type Resolution = {
  width: number
  height: number
}

/**
 * Input descriptor. Built by validation; the scheduler only reads `path`.
 */
export type AudioDescriptor = {
  /** Absolute path; also the registry key. */
  path: string
  filename: string
  sizeBytes: number
  /** 0 when ffprobe reports no duration */
  durationSeconds: number
  sampleRate?: number
  bitrateKbps?: number
  channels?: number
  tags: Record<string, string>
}

export type OutputSpec = {
  path: string
  filename: string
  resolution: Resolution
  fps: number
  /** `#RRGGBB` */
  backgroundColor: string
}

const RESOLUTION_PATTERN = /^(\d+)x(\d+)$/

export function parseResolution(value: string): Resolution {
  const match = RESOLUTION_PATTERN.exec(value.trim())

  if (!match?.[1] || !match[2]) {
    throw ConversionError.invalidSettings("resolution", value, "expected WIDTHxHEIGHT")
  }

  const width = Number.parseInt(match[1], 10)
  const height = Number.parseInt(match[2], 10)

  if (width <= 0 || height <= 0) {
    throw ConversionError.invalidSettings("resolution", value, "dimensions must be positive")
  }

  return { width, height }
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`
}
