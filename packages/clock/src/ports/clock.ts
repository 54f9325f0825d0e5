import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Wall-clock time as a Date.
   *
   * @remarks
   * Use for timestamps that end up in records or events; use `nowMs()` for arithmetic.
   */
  now(): Date

  /** Milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Wait for `ms` milliseconds.
   *
   * Resolves (never rejects) as soon as `signal` aborts, so callers can race a sleep
   * against other wake-ups and cancel the timer afterwards.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
