import { type ErrorDescription, formatErrorMessage } from "../domains/conversion/model/error-catalog"
import type { ConversionEvent, ValidationEvent } from "../domains/conversion/model/events.model"
import type { QuickFilterError } from "../domains/conversion/model/validation.model"

export type WriteLine = (line: string) => void

export type ReporterOptions = {
  /** Show technical details under error messages */
  verbose: boolean
  /** Print progress only when it crosses a multiple of this many percent */
  progressStep: number
}

function formatSeconds(seconds: number): string {
  const total = Math.round(seconds)
  const minutes = Math.floor(total / 60)
  const rest = total % 60

  return minutes > 0 ? `${minutes}m${String(rest).padStart(2, "0")}s` : `${rest}s`
}

/**
 * Turns conversion and validation events into terminal lines.
 */
export class Reporter {
  private readonly lastStep = new Map<string, number>()

  constructor(
    private readonly write: WriteLine,
    private readonly options: ReporterOptions = { verbose: false, progressStep: 10 },
  ) {}

  quickFilterErrors(errors: readonly QuickFilterError[]): void {
    for (const { path, message } of errors) {
      this.write(`[skipped] ${path}: ${message}`)
    }
  }

  validation(event: ValidationEvent): void {
    switch (event.kind) {
      case "validation_started":
        return
      case "validation_succeeded":
        this.write(`[valid] ${event.audio.filename} (${formatSeconds(event.audio.durationSeconds)})`)
        return
      case "validation_failed":
        this.error(`[invalid] ${event.path}`, event.error)
        return
    }
  }

  conversion(event: ConversionEvent): void {
    switch (event.kind) {
      case "job_started":
        this.lastStep.set(event.job.id, 0)
        this.write(`[start] ${event.job.input.filename} -> ${event.job.output.path}`)
        return

      case "job_progress": {
        const step = Math.floor(event.percent / this.options.progressStep)
        if (step <= (this.lastStep.get(event.job.id) ?? 0)) return

        this.lastStep.set(event.job.id, step)
        const eta = event.etaSeconds === undefined ? "" : ` (eta ${formatSeconds(event.etaSeconds)})`
        this.write(`[${Math.floor(event.percent)}%] ${event.job.input.filename}${eta}`)
        return
      }

      case "job_completed":
        this.lastStep.delete(event.job.id)
        this.write(`[done] ${event.job.input.filename} -> ${event.job.output.path}`)
        return

      case "job_failed":
        this.lastStep.delete(event.job.id)
        this.error(`[failed] ${event.job.input.filename}`, event.error, event.message)
        return

      case "job_cancelled":
        this.lastStep.delete(event.job.id)
        this.write(`[cancelled] ${event.job.input.filename}`)
        return

      case "all_complete":
        this.write(`Finished: ${event.successCount} succeeded, ${event.errorCount} failed`)
        return
    }
  }

  private error(prefix: string, error: ErrorDescription, message = error.message): void {
    const [, ...rest] = formatErrorMessage(error, { includeTechnical: this.options.verbose })
      .split("\n\n")

    this.write(`${prefix}: ${message}`)
    for (const line of rest) this.write(`  ${line}`)
  }
}
