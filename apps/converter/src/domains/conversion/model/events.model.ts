import type { ErrorDescription } from "./error-catalog"
import type { JobSnapshot } from "./job.model"
import type { AudioDescriptor } from "./media.model"

export type ConversionEvent =
  | { kind: "job_started"; job: JobSnapshot }
  | { kind: "job_progress"; job: JobSnapshot; percent: number; etaSeconds?: number }
  | { kind: "job_completed"; job: JobSnapshot }
  | { kind: "job_failed"; job: JobSnapshot; message: string; error: ErrorDescription }
  | { kind: "job_cancelled"; job: JobSnapshot }
  | { kind: "all_complete"; successCount: number; errorCount: number }

export type ValidationEvent =
  | { kind: "validation_started"; path: string }
  | { kind: "validation_succeeded"; path: string; audio: AudioDescriptor }
  | { kind: "validation_failed"; path: string; message: string; error: ErrorDescription }

/**
 * Fire-and-forget delivery into the presentation layer.
 * Implementations must not run consumer code synchronously inside `publish`.
 */
export interface EventSink<E> {
  publish(event: E): void
}
