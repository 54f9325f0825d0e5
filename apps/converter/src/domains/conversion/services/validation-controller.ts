import type { Logger } from "@stillframe/logger"
import { describeError } from "../model/error-catalog"
import type { EventSink, ValidationEvent } from "../model/events.model"
import type { AudioDescriptor } from "../model/media.model"
import type {
  AudioValidator,
  InvalidFile,
  QuickFilterResult,
  ValidationReport,
} from "../model/validation.model"
import { quickFilter, type StatFn } from "./quick-filter"

export type ValidationControllerDeps = {
  logger: Logger
  validator: AudioValidator
  events: EventSink<ValidationEvent>
  /** @default fs.statSync */
  stat?: StatFn
}

export type ValidationControllerConfig = {
  maxBytes: number
}

type UnitResult =
  | { kind: "valid"; audio: AudioDescriptor }
  | { kind: "invalid"; entry: InvalidFile }

/**
 * Validates every file at once, one independent unit per path, no cap.
 */
export class ValidationController {
  private readonly logger: Logger

  constructor(
    private readonly deps: ValidationControllerDeps,
    private readonly config: ValidationControllerConfig,
  ) {
    this.logger = deps.logger.child({ component: "validation-controller" })
  }

  async validate(paths: readonly string[]): Promise<ValidationReport> {
    const results = await Promise.all(paths.map((p) => this.validateOne(p)))

    const report: ValidationReport = { valid: [], invalid: [] }

    for (const result of results) {
      if (result.kind === "valid") report.valid.push(result.audio)
      else report.invalid.push(result.entry)
    }

    this.logger.info("Validation finished", {
      valid: report.valid.length,
      invalid: report.invalid.length,
    })

    return report
  }

  quickFilter(paths: readonly string[]): QuickFilterResult {
    return quickFilter(paths, {
      maxBytes: this.config.maxBytes,
      ...(this.deps.stat && { stat: this.deps.stat }),
    })
  }

  private async validateOne(path: string): Promise<UnitResult> {
    this.deps.events.publish({ kind: "validation_started", path })

    try {
      const audio = await this.deps.validator.validate(path)

      this.deps.events.publish({ kind: "validation_succeeded", path, audio })
      return { kind: "valid", audio }
    } catch (err) {
      const error = describeError(err)

      this.logger.warn("Validation failed", {
        inputPath: path,
        code: error.code,
        technicalDetails: error.technicalDetails,
      })
      this.deps.events.publish({ kind: "validation_failed", path, message: error.message, error })

      return { kind: "invalid", entry: { path, message: error.message, error } }
    }
  }
}
