import type { ConversionServices } from "../domains/conversion/composition"
import type { Job } from "../domains/conversion/model/job.model"
import type { Reporter } from "./reporter"

export type ConversionSummary = {
  /** Rejected by the quick filter or by validation */
  rejected: number
  submitted: number
  completed: number
  failed: number
  cancelled: number
}

export function allSucceeded(summary: ConversionSummary): boolean {
  return summary.rejected === 0 && summary.submitted > 0 && summary.completed === summary.submitted
}

function summarize(rejected: number, jobs: readonly Job[]): ConversionSummary {
  const unique = new Set(jobs)

  const summary: ConversionSummary = {
    rejected,
    submitted: unique.size,
    completed: 0,
    failed: 0,
    cancelled: 0,
  }

  for (const job of unique) {
    if (job.status === "completed") summary.completed++
    else if (job.status === "cancelled") summary.cancelled++
    else summary.failed++
  }

  return summary
}

/**
 * Quick filter, validate, queue and run every file, printing events as they arrive.
 * Resolves after `all_complete`, or once the conversion channel is closed (cancel).
 */
export async function convertFiles(
  files: readonly string[],
  conversion: ConversionServices,
  reporter: Reporter,
): Promise<ConversionSummary> {
  const { scheduler, validation, validationEvents, conversionEvents } = conversion

  const filtered = validation.quickFilter(files)
  reporter.quickFilterErrors(filtered.errors)

  const report = await validation.validate(filtered.valid)
  for (const event of validationEvents.drain()) reporter.validation(event)

  const rejected = filtered.errors.length + report.invalid.length

  if (report.valid.length === 0) return summarize(rejected, [])

  const planned = await conversion.outputs.planBatch(report.valid)

  // interrupted before anything was queued
  if (conversionEvents.isClosed) return summarize(rejected, [])

  const jobs = planned.map(({ input, output }) => scheduler.submit(input, output))

  scheduler.start()

  for await (const event of conversionEvents) {
    reporter.conversion(event)
    if (event.kind === "all_complete") break
  }

  return summarize(rejected, jobs)
}
