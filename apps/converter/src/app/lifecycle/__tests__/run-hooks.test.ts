import { FakeClock } from "@stillframe/clock"
import { beforeEach, describe, expect, it } from "vitest"
import { RecordingLogger } from "../../../tests/recording-logger"
import type { LifecycleHook, LifecycleHookContext } from "../lifecycle-hook"
import { runHooks } from "../run-hooks"

describe("runHooks", () => {
  let clock: FakeClock
  let logger: RecordingLogger
  let ran: string[]

  beforeEach(() => {
    clock = new FakeClock(0)
    logger = new RecordingLogger()
    ran = []
  })

  const hook = (name: string, fn: (ctx: LifecycleHookContext) => void = () => {}): LifecycleHook => ({
    name,
    fn: async (ctx) => {
      ran.push(name)
      fn(ctx)
    },
  })

  const failing = (name: string, err: Error): LifecycleHook => ({
    name,
    fn: async () => {
      ran.push(name)
      throw err
    },
  })

  it("runs hooks in order", async () => {
    const result = await runHooks([hook("a"), hook("b")], {
      phase: "start",
      clock,
      logger,
      budgetMs: 1_000,
    })

    expect(ran).toEqual(["a", "b"])
    expect(result).toEqual({ failures: [], timedOut: false })
    expect(logger.messages("debug")).toEqual(["Ran start hook: a", "Ran start hook: b"])
  })

  it("records a failure and keeps going", async () => {
    const boom = new Error("boom")

    const result = await runHooks([failing("a", boom), hook("b")], {
      phase: "stop",
      clock,
      logger,
      budgetMs: 1_000,
    })

    expect(ran).toEqual(["a", "b"])
    expect(result.failures).toEqual([{ hook: "a", error: boom }])
    expect(logger.messages("error")).toEqual(["stop hook failed: a"])
  })

  it("stops at the first failure with failFast", async () => {
    const result = await runHooks([failing("a", new Error("boom")), hook("b")], {
      phase: "start",
      clock,
      logger,
      budgetMs: 1_000,
      failFast: true,
    })

    expect(ran).toEqual(["a"])
    expect(result.failures).toHaveLength(1)
  })

  it("hands each hook the time left in the phase", async () => {
    const remaining: number[] = []

    await runHooks(
      [
        hook("a", (ctx) => {
          remaining.push(ctx.timeRemainingMs)
          clock.set(300)
        }),
        hook("b", (ctx) => {
          remaining.push(ctx.timeRemainingMs)
        }),
      ],
      { phase: "stop", clock, logger, budgetMs: 1_000 },
    )

    expect(remaining).toEqual([1_000, 700])
  })

  it("stops once a hook uses up the budget", async () => {
    const result = await runHooks(
      [hook("slow", () => clock.set(1_500)), hook("next")],
      { phase: "stop", clock, logger, budgetMs: 1_000 },
    )

    expect(ran).toEqual(["slow"])
    expect(result.timedOut).toBe(true)
    expect(logger.messages("warn")).toEqual(["stop budget exceeded during hook: slow"])
  })

  it("runs nothing without a budget", async () => {
    const result = await runHooks([hook("a")], { phase: "start", clock, logger, budgetMs: 0 })

    expect(ran).toEqual([])
    expect(result.timedOut).toBe(true)
    expect(logger.messages("warn")).toEqual(["Skipping remaining start hooks, budget exhausted"])
  })
})
