import { FakeClock } from "@stillframe/clock"
import { beforeEach, describe, expect, it } from "vitest"
import { audio, outputFor } from "../../../../tests/fixtures"
import { Job } from "../../model/job.model"
import { JobRegistry } from "../job-registry"

describe("JobRegistry", () => {
  let clock: FakeClock
  let registry: JobRegistry

  beforeEach(() => {
    clock = new FakeClock()
    registry = new JobRegistry()
  })

  const addJob = (path: string) => {
    const job = new Job(audio(path), outputFor({ path }), clock)
    registry.put(job)
    return job
  }

  it("keys jobs by input path", () => {
    const job = addJob("/music/a.mp3")

    expect(registry.get("/music/a.mp3")).toBe(job)
    expect(registry.get("/music/b.mp3")).toBeUndefined()
    expect(registry.size).toBe(1)
  })

  it("replaces the job for a path on put", () => {
    addJob("/music/a.mp3")
    const second = addJob("/music/a.mp3")

    expect(registry.get("/music/a.mp3")).toBe(second)
    expect(registry.size).toBe(1)
  })

  it("counts jobs per status", () => {
    addJob("/music/queued.mp3")

    addJob("/music/running.mp3").start()

    const done = addJob("/music/done.mp3")
    done.start()
    done.completeSuccess()

    addJob("/music/failed.mp3").completeFailure("boom")
    addJob("/music/cancelled.mp3").cancel()

    expect(registry.statistics()).toEqual({
      total: 5,
      queued: 1,
      processing: 1,
      completed: 1,
      failed: 1,
      cancelled: 1,
    })
  })

  it("evicts finished jobs only", () => {
    const queued = addJob("/music/queued.mp3")
    addJob("/music/failed.mp3").completeFailure("boom")
    addJob("/music/cancelled.mp3").cancel()

    expect(registry.evictFinished()).toBe(2)
    expect(registry.values()).toEqual([queued])
  })

  it("starts out empty", () => {
    expect(registry.statistics()).toEqual({
      total: 0,
      queued: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    })
    expect(registry.evictFinished()).toBe(0)
  })
})
