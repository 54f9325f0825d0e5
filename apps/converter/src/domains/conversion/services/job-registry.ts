import type { Job, JobStatistics } from "../model/job.model"

/**
 * Jobs keyed by input path; at most one live job per path.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, Job>()

  get(path: string): Job | undefined {
    return this.jobs.get(path)
  }

  put(job: Job): void {
    this.jobs.set(job.input.path, job)
  }

  values(): Job[] {
    return [...this.jobs.values()]
  }

  get size(): number {
    return this.jobs.size
  }

  statistics(): JobStatistics {
    const stats: JobStatistics = {
      total: 0,
      queued: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    }

    for (const job of this.jobs.values()) {
      stats.total++
      stats[job.status]++
    }

    return stats
  }

  /** @returns number of jobs removed */
  evictFinished(): number {
    let removed = 0

    for (const [path, job] of this.jobs) {
      if (job.isActive) continue
      this.jobs.delete(path)
      removed++
    }

    return removed
  }
}
