import { randomUUID } from "node:crypto"
import type { Milliseconds, Seconds, TimeSource } from "@stillframe/clock"
import { type ConversionErrorCode, JobStateError } from "./conversion.errors"
import type { AudioDescriptor, OutputSpec } from "./media.model"

export type JobId = `job_${string}`
export const JobId = {
  generate: (): JobId => `job_${randomUUID()}`,
}

export type JobStatus = "queued" | "processing" | "completed" | "failed" | "cancelled"

export const activeStatuses: ReadonlySet<JobStatus> = new Set(["queued", "processing"])

/**
 * Immutable copy of a job, used in event payloads.
 */
export type JobSnapshot = Readonly<{
  id: JobId
  input: AudioDescriptor
  output: OutputSpec
  status: JobStatus
  progress: number
  etaSeconds: Seconds | null
  errorMessage: string | null
  errorCode: ConversionErrorCode | null
  canCancel: boolean
  createdAt: Date
  startedAt: Date | null
  completedAt: Date | null
}>

export type JobStatistics = {
  total: number
  queued: number
  processing: number
  completed: number
  failed: number
  cancelled: number
}

/**
 * One conversion task.
 *
 * `queued -> processing -> completed | failed | cancelled`; nothing leaves a finished
 * state. Illegal transitions throw {@link JobStateError}. Cancelling aborts {@link signal},
 * which is the token handed to the transcoder.
 */
export class Job {
  readonly id: JobId = JobId.generate()
  readonly createdAt: Date

  private _status: JobStatus = "queued"
  private _progress = 0
  private _etaSeconds: Seconds | null = null
  private _errorMessage: string | null = null
  private _errorCode: ConversionErrorCode | null = null
  private _canCancel = true
  private _startedAt: Date | null = null
  private _completedAt: Date | null = null

  private readonly abort = new AbortController()

  constructor(
    readonly input: AudioDescriptor,
    readonly output: OutputSpec,
    private readonly time: TimeSource,
  ) {
    this.createdAt = time.now()
  }

  get status(): JobStatus {
    return this._status
  }

  get progress(): number {
    return this._progress
  }

  get etaSeconds(): Seconds | null {
    return this._etaSeconds
  }

  get errorMessage(): string | null {
    return this._errorMessage
  }

  get errorCode(): ConversionErrorCode | null {
    return this._errorCode
  }

  get canCancel(): boolean {
    return this._canCancel
  }

  get startedAt(): Date | null {
    return this._startedAt
  }

  get completedAt(): Date | null {
    return this._completedAt
  }

  get signal(): AbortSignal {
    return this.abort.signal
  }

  get isActive(): boolean {
    return activeStatuses.has(this._status)
  }

  get isFinished(): boolean {
    return !this.isActive
  }

  start(): void {
    if (this._status !== "queued") {
      throw JobStateError.illegalTransition(this.id, "start", this._status)
    }

    this._status = "processing"
    this._startedAt = this.time.now()
    this._progress = 0
    this._canCancel = true
  }

  /**
   * Progress never moves backwards; values are clamped to [0, 100].
   */
  updateProgress(percent: number, etaSeconds?: Seconds): void {
    if (this._status !== "processing") {
      throw JobStateError.illegalTransition(this.id, "update progress of", this._status)
    }

    const clamped = Math.min(100, Math.max(0, Number.isNaN(percent) ? 0 : percent))
    this._progress = Math.max(this._progress, clamped)

    if (etaSeconds !== undefined) {
      this._etaSeconds = Math.max(0, etaSeconds)
    }
  }

  completeSuccess(): void {
    if (this._status !== "processing") {
      throw JobStateError.illegalTransition(this.id, "complete", this._status)
    }

    this._status = "completed"
    this._progress = 100
    this._etaSeconds = 0
    this._errorMessage = null
    this._errorCode = null
    this.finish()
  }

  completeFailure(message: string, code?: ConversionErrorCode): void {
    if (!this.isActive) {
      throw JobStateError.illegalTransition(this.id, "fail", this._status)
    }

    this._status = "failed"
    this._errorMessage = message
    this._errorCode = code ?? null
    this.finish()
  }

  /**
   * @returns `false` without changing anything once the job can no longer be cancelled
   */
  cancel(): boolean {
    if (!this._canCancel) return false

    this._status = "cancelled"
    this.finish()
    this.abort.abort()

    return true
  }

  /** `undefined` until the job has started. */
  elapsedMs(): Milliseconds | undefined {
    if (!this._startedAt) return undefined

    const end = this._completedAt?.getTime() ?? this.time.nowMs()
    return end - this._startedAt.getTime()
  }

  toSnapshot(): JobSnapshot {
    return Object.freeze({
      id: this.id,
      input: structuredClone(this.input),
      output: structuredClone(this.output),
      status: this._status,
      progress: this._progress,
      etaSeconds: this._etaSeconds,
      errorMessage: this._errorMessage,
      errorCode: this._errorCode,
      canCancel: this._canCancel,
      createdAt: this.createdAt,
      startedAt: this._startedAt,
      completedAt: this._completedAt,
    })
  }

  private finish(): void {
    this._completedAt = this.time.now()
    this._canCancel = false
  }
}
