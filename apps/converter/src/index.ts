export { type AppConfig, loadAppConfig, mapEnvToConfig } from "./app/config"
export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export {
  type ConversionServices,
  createConversionServices,
} from "./domains/conversion/composition"
export {
  ConversionError,
  type ConversionErrorCode,
  JobStateError,
} from "./domains/conversion/model/conversion.errors"
export {
  describeError,
  type ErrorDescription,
  errorCatalog,
  formatErrorMessage,
  toConversionError,
} from "./domains/conversion/model/error-catalog"
export type {
  ConversionEvent,
  EventSink,
  ValidationEvent,
} from "./domains/conversion/model/events.model"
export {
  Job,
  JobId,
  type JobSnapshot,
  type JobStatistics,
  type JobStatus,
} from "./domains/conversion/model/job.model"
export {
  type AudioDescriptor,
  formatResolution,
  type OutputSpec,
  parseResolution,
  type Resolution,
} from "./domains/conversion/model/media.model"
export type {
  TranscodeOptions,
  TranscodeOutcome,
  TranscodeRequest,
  Transcoder,
} from "./domains/conversion/model/transcoder.model"
export type {
  AudioValidator,
  QuickFilterResult,
  ValidationReport,
} from "./domains/conversion/model/validation.model"
export { FfprobeAudioValidator } from "./domains/conversion/services/audio-validator.ffprobe"
export {
  ConversionScheduler,
  type ConversionSchedulerConfig,
  type ConversionSchedulerDeps,
} from "./domains/conversion/services/conversion-scheduler"
export { EventChannel } from "./domains/conversion/services/event-channel"
export {
  formatTimestamp,
  OutputPlanner,
  type OutputSettings,
  type PlannedOutput,
  planOutput,
} from "./domains/conversion/services/output-plan"
export { quickFilter } from "./domains/conversion/services/quick-filter"
export { FfmpegTranscoder } from "./domains/conversion/services/transcoder.ffmpeg"
export { ValidationController } from "./domains/conversion/services/validation-controller"
