import type { Clock, Milliseconds, Seconds } from "@stillframe/clock"
import type { Logger } from "@stillframe/logger"
import { ConversionError } from "../model/conversion.errors"
import { describeError } from "../model/error-catalog"
import type { ConversionEvent, EventSink } from "../model/events.model"
import { Job, type JobStatistics } from "../model/job.model"
import type { AudioDescriptor, OutputSpec } from "../model/media.model"
import type { Transcoder } from "../model/transcoder.model"
import { JobRegistry } from "./job-registry"

export type ConversionSchedulerDeps = {
  clock: Clock
  logger: Logger
  transcoder: Transcoder
  events: EventSink<ConversionEvent>
}

export type ConversionSchedulerConfig = {
  /** Max jobs in the Active Set; adjustable later via `setMaxConcurrent` */
  maxConcurrent: number

  /** Upper bound on how long the admission loop sleeps without a wake signal */
  pollIntervalMs: Milliseconds

  /** Evict finished jobs right after `all_complete` */
  autoClearOnComplete?: boolean
}

const CANCELLED_REASON = "Conversion was cancelled"

type Signal = { promise: Promise<void>; trigger: () => void }

function createSignal(): Signal {
  let trigger!: () => void
  const promise = new Promise<void>((resolve) => {
    trigger = resolve
  })
  return { promise, trigger }
}

function assertConcurrency(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw ConversionError.invalidSettings(
      "maxConcurrent",
      value,
      "must be an integer of at least 1",
    )
  }
}

/**
 * Bounded-concurrency conversion queue.
 *
 * Jobs are admitted FIFO into an Active Set capped at `maxConcurrent`. The admission
 * loop wakes on submit, cancel, worker completion and cap changes, and otherwise
 * re-checks every `pollIntervalMs`. Once the queue and the Active Set are both empty it
 * publishes a single `all_complete` and stops.
 */
export class ConversionScheduler {
  private readonly registry = new JobRegistry()
  private readonly pending: Job[] = []
  private readonly active = new Set<Job>()
  private readonly inFlight = new Set<Promise<void>>()
  private readonly logger: Logger

  private running = false
  private generation = 0
  private maxConcurrent: number
  private wakeSignal: Signal = createSignal()
  private loop: Promise<void> = Promise.resolve()

  private constructor(
    private readonly deps: ConversionSchedulerDeps,
    private readonly config: ConversionSchedulerConfig,
  ) {
    this.maxConcurrent = config.maxConcurrent
    this.logger = deps.logger.child({ component: "conversion-scheduler" })
  }

  /**
   * Checks the transcoder once; a missing tool is fatal here rather than per job.
   *
   * @throws {ConversionError} `transcoder_unavailable` or `invalid_settings`
   */
  static async create(
    deps: ConversionSchedulerDeps,
    config: ConversionSchedulerConfig,
  ): Promise<ConversionScheduler> {
    assertConcurrency(config.maxConcurrent)

    let available: boolean

    try {
      available = await deps.transcoder.isAvailable()
    } catch (err) {
      throw ConversionError.transcoderUnavailable(err)
    }

    if (!available) {
      throw ConversionError.transcoderUnavailable()
    }

    return new ConversionScheduler(deps, config)
  }

  /**
   * Queue a conversion. While a job for the same input path is still active, that job
   * is returned instead; a finished one is replaced.
   */
  submit(input: AudioDescriptor, output: OutputSpec): Job {
    const existing = this.registry.get(input.path)

    if (existing?.isActive) {
      this.logger.debug("Input already queued", {
        jobId: existing.id,
        inputPath: input.path,
      })
      return existing
    }

    const job = new Job(input, output, this.deps.clock)

    this.registry.put(job)
    this.pending.push(job)
    this.logger.debug("Job queued", {
      jobId: job.id,
      inputPath: input.path,
      outputPath: output.path,
    })

    this.wake()
    return job
  }

  /** Starts the admission loop in the background and returns immediately. */
  start(): void {
    if (this.running) {
      this.logger.warn("Conversions already running")
      return
    }

    if (this.pending.length === 0) {
      this.logger.warn("No jobs in queue")
      return
    }

    this.running = true
    this.loop = this.runLoop(++this.generation)
  }

  cancel(inputPath: string): boolean {
    const job = this.registry.get(inputPath)

    if (!job?.isActive || !job.cancel()) return false

    this.publish({ kind: "job_cancelled", job: job.toSnapshot() })
    this.logger.info("Conversion cancelled", { jobId: job.id, inputPath })

    this.wake()
    return true
  }

  /**
   * Stops the loop, cancels every running job and empties the queue.
   *
   * Jobs drained from the queue are marked `failed` with code `cancelled`, not
   * `cancelled`; running ones become `cancelled`. No `all_complete` follows.
   */
  cancelAll(): void {
    this.running = false
    this.wake()

    for (const job of this.active) {
      if (!job.cancel()) continue
      this.publish({ kind: "job_cancelled", job: job.toSnapshot() })
    }
    this.active.clear()

    const drained = this.pending.splice(0, this.pending.length)
    const error = describeError(ConversionError.cancelled())

    for (const job of drained) {
      if (job.status !== "queued") continue

      job.completeFailure(CANCELLED_REASON, "cancelled")
      this.publish({
        kind: "job_failed",
        job: job.toSnapshot(),
        message: CANCELLED_REASON,
        error,
      })
    }

    this.logger.info("All conversions cancelled", { drained: drained.length })
  }

  /**
   * `cancelAll()`, then wait for in-flight workers to return.
   */
  async stop(): Promise<void> {
    this.cancelAll()

    while (this.inFlight.size > 0) {
      await Promise.allSettled(this.inFlight)
    }

    await this.loop
  }

  /** Resolves once the current admission loop has exited. */
  whenIdle(): Promise<void> {
    return this.loop
  }

  /** Read by the admission loop on its next iteration. */
  setMaxConcurrent(value: number): void {
    assertConcurrency(value)

    this.maxConcurrent = value
    this.wake()
  }

  getMaxConcurrent(): number {
    return this.maxConcurrent
  }

  getJob(inputPath: string): Job | undefined {
    return this.registry.get(inputPath)
  }

  jobs(): Job[] {
    return this.registry.values()
  }

  statistics(): JobStatistics {
    return this.registry.statistics()
  }

  /** @returns number of finished jobs evicted from the registry */
  clearFinished(): number {
    return this.registry.evictFinished()
  }

  isConverting(): boolean {
    return this.running || this.active.size > 0
  }

  /** Jobs currently dispatched to a worker. */
  activeCount(): number {
    return this.active.size
  }

  /** Jobs waiting for a slot, cancelled ones not yet discarded included. */
  pendingCount(): number {
    return this.pending.length
  }

  private async runLoop(generation: number): Promise<void> {
    this.logger.info("Conversions started", {
      queued: this.pending.length,
      maxConcurrent: this.maxConcurrent,
    })

    while (this.isCurrent(generation)) {
      // Reset before looking at state, so a wake raised mid-iteration is not lost.
      this.wakeSignal = createSignal()

      try {
        this.pruneActive()
        this.admit()

        if (this.pending.length === 0 && this.active.size === 0) {
          this.complete()
          break
        }
      } catch (err) {
        this.logger.error("Admission loop iteration failed", { err })
      }

      await this.waitForWake()
    }
  }

  private isCurrent(generation: number): boolean {
    return this.running && this.generation === generation
  }

  private pruneActive(): void {
    for (const job of this.active) {
      if (!job.isActive) this.active.delete(job)
    }
  }

  private admit(): void {
    while (this.active.size < this.maxConcurrent) {
      const job = this.pending.shift()
      if (!job) return

      if (job.isFinished) {
        this.logger.debug("Skipping finished job", { jobId: job.id, status: job.status })
        continue
      }

      this.dispatch(job)
    }
  }

  private complete(): void {
    this.running = false

    const stats = this.registry.statistics()
    const successCount = stats.completed
    const errorCount = stats.failed + stats.cancelled

    this.publish({ kind: "all_complete", successCount, errorCount })
    this.logger.info("All conversions complete", { successCount, errorCount })

    if (this.config.autoClearOnComplete) {
      this.registry.evictFinished()
    }
  }

  private dispatch(job: Job): void {
    this.active.add(job)

    const task: Promise<void> = this.execute(job).finally(() => {
      this.inFlight.delete(task)
      this.wake()
    })

    this.inFlight.add(task)
  }

  /** Never rejects; every outcome ends up on the job and in an event. */
  private async execute(job: Job): Promise<void> {
    const logger = this.logger.child({
      jobId: job.id,
      inputPath: job.input.path,
      outputPath: job.output.path,
    })

    try {
      job.start()
      this.publish({ kind: "job_started", job: job.toSnapshot() })
      logger.info("Conversion started")

      const outcome = await this.deps.transcoder.convert(
        { input: job.input, output: job.output },
        {
          signal: job.signal,
          onProgress: (percent, etaSeconds) => this.reportProgress(job, percent, etaSeconds),
        },
      )

      if (job.status === "cancelled") {
        logger.info("Conversion stopped after cancel", { durationMs: job.elapsedMs() })
        return
      }

      if (outcome.kind === "failed") {
        this.fail(job, outcome.error, logger)
        return
      }

      job.completeSuccess()
      this.publish({ kind: "job_completed", job: job.toSnapshot() })
      logger.info("Conversion completed", {
        durationMs: job.elapsedMs(),
        sizeBytes: outcome.sizeBytes,
      })
    } catch (err) {
      if (job.status === "cancelled") return
      this.fail(job, err, logger)
    }
  }

  private reportProgress(job: Job, percent: number, etaSeconds?: Seconds): void {
    if (job.status !== "processing") return

    job.updateProgress(percent, etaSeconds)

    this.publish({
      kind: "job_progress",
      job: job.toSnapshot(),
      percent: job.progress,
      ...(job.etaSeconds !== null && { etaSeconds: job.etaSeconds }),
    })
  }

  private fail(job: Job, err: unknown, logger: Logger): void {
    const error = describeError(err)

    logger.error("Conversion failed", {
      err,
      code: error.code,
      technicalDetails: error.technicalDetails,
      durationMs: job.elapsedMs(),
    })

    if (!job.isActive) return

    job.completeFailure(error.message, error.code)
    this.publish({ kind: "job_failed", job: job.toSnapshot(), message: error.message, error })
  }

  private publish(event: ConversionEvent): void {
    this.deps.events.publish(event)
  }

  private wake(): void {
    this.wakeSignal.trigger()
  }

  private async waitForWake(): Promise<void> {
    const controller = new AbortController()

    try {
      await Promise.race([
        this.deps.clock.sleep(this.config.pollIntervalMs, controller.signal),
        this.wakeSignal.promise,
      ])
    } finally {
      controller.abort()
    }
  }
}
