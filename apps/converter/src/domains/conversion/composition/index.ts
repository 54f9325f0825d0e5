import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { ConversionEvent, ValidationEvent } from "../model/events.model"
import { parseResolution } from "../model/media.model"
import type { Transcoder } from "../model/transcoder.model"
import type { AudioValidator } from "../model/validation.model"
import { FfprobeAudioValidator, fluentProbe } from "../services/audio-validator.ffprobe"
import { ConversionScheduler } from "../services/conversion-scheduler"
import { EventChannel } from "../services/event-channel"
import { OutputPlanner, type OutputSettings } from "../services/output-plan"
import { FfmpegTranscoder, fluentCommandFactory } from "../services/transcoder.ffmpeg"
import { ValidationController } from "../services/validation-controller"

export type ConversionServices = {
  transcoder: Transcoder
  validator: AudioValidator
  conversionEvents: EventChannel<ConversionEvent>
  validationEvents: EventChannel<ValidationEvent>
  scheduler: ConversionScheduler
  validation: ValidationController
  outputs: OutputPlanner
}

export type ConversionOverrides = Partial<Pick<ConversionServices, "transcoder" | "validator">>

/**
 * @throws {ConversionError} `transcoder_unavailable` when ffmpeg cannot be found
 */
export async function createConversionServices(
  config: AppConfig,
  core: CoreServices,
  overrides: ConversionOverrides = {},
): Promise<ConversionServices> {
  const outputSettings: OutputSettings = {
    ...(config.output.directory !== undefined && { directory: config.output.directory }),
    filenameTemplate: config.output.filenameTemplate,
    resolution: parseResolution(config.output.resolution),
    fps: config.output.fps,
    backgroundColor: config.output.backgroundColor,
  }

  const transcoder =
    overrides.transcoder ??
    new FfmpegTranscoder({
      clock: core.clock,
      logger: core.logger.child({ component: "ffmpeg" }),
      createCommand: fluentCommandFactory(config.ffmpeg.ffmpegPath),
    })

  const validator =
    overrides.validator ??
    new FfprobeAudioValidator(
      {
        logger: core.logger.child({ component: "ffprobe" }),
        probe: fluentProbe(config.ffmpeg.ffprobePath),
      },
      { maxBytes: config.validation.maxBytes },
    )

  const conversionEvents = new EventChannel<ConversionEvent>()
  const validationEvents = new EventChannel<ValidationEvent>()

  const scheduler = await ConversionScheduler.create(
    {
      clock: core.clock,
      logger: core.logger,
      transcoder,
      events: conversionEvents,
    },
    {
      maxConcurrent: config.scheduler.maxConcurrent,
      pollIntervalMs: config.scheduler.pollIntervalMs,
      autoClearOnComplete: config.scheduler.autoClearOnComplete,
    },
  )

  const validation = new ValidationController(
    { logger: core.logger, validator, events: validationEvents },
    { maxBytes: config.validation.maxBytes },
  )

  return {
    transcoder,
    validator,
    conversionEvents,
    validationEvents,
    scheduler,
    validation,
    outputs: new OutputPlanner({ clock: core.clock }, outputSettings),
  }
}
