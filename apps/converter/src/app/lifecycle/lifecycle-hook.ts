import type { Milliseconds } from "@stillframe/clock"

export type LifecycleHookContext = {
  /** Aborted once the phase budget runs out */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export type LifecycleHook = {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export type HookFailure = {
  hook: string
  error: unknown
}

export type HookPhase = "start" | "stop"

export type HookRunResult = {
  failures: HookFailure[]
  timedOut: boolean
}
