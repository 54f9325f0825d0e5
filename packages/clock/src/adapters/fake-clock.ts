import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAt: Milliseconds
  order: number
  resolve: () => void
}

/**
 * Manually driven clock for tests.
 *
 * `sleep()` only resolves once `advance()` or `set()` moves time past its deadline
 * (or its signal aborts), so loops that poll on the clock make progress one step at a time.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private pending: PendingSleep[] = []
  private order = 0

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  /**
   * Move time forward, wake every sleeper that is now due (earliest deadline first),
   * then yield a macrotask so the woken code can run until its next suspension.
   */
  async advance(ms: Milliseconds): Promise<void> {
    this.set(this.time + ms)

    await new Promise<void>((resolve) => setImmediate(resolve))
  }

  set(ms: Milliseconds): void {
    this.time = ms

    const due = this.pending
      .filter((p) => p.wakeAt <= this.time)
      .sort((a, b) => a.wakeAt - b.wakeAt || a.order - b.order)

    this.pending = this.pending.filter((p) => p.wakeAt > this.time)

    for (const sleeper of due) sleeper.resolve()
  }

  /** Number of sleeps still waiting for time to pass. */
  pendingSleeps(): number {
    return this.pending.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        order: this.order++,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.pending = this.pending.filter((p) => p !== entry)
        resolve()
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.pending.push(entry)
    })
  }
}
