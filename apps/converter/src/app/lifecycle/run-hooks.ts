import type { Clock, Milliseconds } from "@stillframe/clock"
import type { Logger } from "@stillframe/logger"
import type { HookPhase, HookRunResult, LifecycleHook } from "./lifecycle-hook"

export type RunHooksOptions = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  /** Budget for the whole phase */
  budgetMs: Milliseconds
  /** Stop at the first failing hook; typical for start */
  failFast?: boolean
}

/**
 * Runs hooks one after another within a shared time budget.
 * A hook that throws is recorded, never rethrown.
 */
export async function runHooks(
  hooks: readonly LifecycleHook[],
  options: RunHooksOptions,
): Promise<HookRunResult> {
  const { phase, clock, logger } = options
  const deadline = clock.nowMs() + options.budgetMs
  const result: HookRunResult = { failures: [], timedOut: false }

  for (const hook of hooks) {
    const remaining = deadline - clock.nowMs()

    if (remaining <= 0) {
      logger.warn(`Skipping remaining ${phase} hooks, budget exhausted`, { hook: hook.name })
      result.timedOut = true
      return result
    }

    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), remaining)

    try {
      await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })
      logger.debug(`Ran ${phase} hook: ${hook.name}`)
    } catch (err) {
      logger.error(`${phase} hook failed: ${hook.name}`, { err })
      result.failures.push({ hook: hook.name, error: err })

      if (options.failFast) return result
    } finally {
      clearTimeout(timer)
    }

    if (controller.signal.aborted || clock.nowMs() >= deadline) {
      logger.warn(`${phase} budget exceeded during hook: ${hook.name}`)
      result.timedOut = true
      return result
    }
  }

  return result
}
