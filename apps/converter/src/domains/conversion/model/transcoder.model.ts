import type { Seconds } from "@stillframe/clock"
import type { ConversionError } from "./conversion.errors"
import type { AudioDescriptor, OutputSpec } from "./media.model"

export type TranscodeRequest = {
  input: AudioDescriptor
  output: OutputSpec
}

export type ProgressSink = (percent: number, etaSeconds?: Seconds) => void

export type TranscodeOptions = {
  /** Aborting terminates the underlying process. */
  signal: AbortSignal
  onProgress: ProgressSink
}

export type TranscodeOutcome =
  | { kind: "succeeded"; outputPath: string; sizeBytes?: number }
  | { kind: "failed"; error: ConversionError }

/**
 * Runs one audio-to-video conversion. Must be safe to call concurrently,
 * and always overwrites the output.
 */
export interface Transcoder {
  isAvailable(): Promise<boolean>
  convert(request: TranscodeRequest, options: TranscodeOptions): Promise<TranscodeOutcome>
}
