import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("resolves after ms elapses", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(50)

    expect(Date.now() - start).toBeGreaterThanOrEqual(45)
  })

  it("clears the timer when aborted", async () => {
    const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout")
    const clock = new SystemClock()
    const ac = new AbortController()

    const pending = clock.sleep(5000, ac.signal)
    ac.abort()
    await pending

    expect(clearTimeoutSpy).toHaveBeenCalled()
  })

  it("removes the abort listener after a normal wake-up", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

    await clock.sleep(10, ac.signal)

    expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
  })
})
