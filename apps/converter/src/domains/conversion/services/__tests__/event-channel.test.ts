import { describe, expect, it } from "vitest"
import { EventChannel } from "../event-channel"

type TestEvent = { n: number }

describe("EventChannel", () => {
  it("buffers events until they are read", async () => {
    const channel = new EventChannel<TestEvent>()

    channel.publish({ n: 1 })
    channel.publish({ n: 2 })

    expect(channel.size).toBe(2)
    expect(await channel.next()).toEqual({ value: { n: 1 }, done: false })
    expect(await channel.next()).toEqual({ value: { n: 2 }, done: false })
    expect(channel.size).toBe(0)
  })

  it("hands an event straight to a waiting reader", async () => {
    const channel = new EventChannel<TestEvent>()
    const pending = channel.next()

    channel.publish({ n: 7 })

    expect(await pending).toEqual({ value: { n: 7 }, done: false })
    expect(channel.size).toBe(0)
  })

  it("does not run the consumer inside publish", () => {
    const channel = new EventChannel<TestEvent>()
    const seen: number[] = []

    void channel.next().then((r) => {
      if (!r.done) seen.push(r.value.n)
    })

    channel.publish({ n: 1 })

    expect(seen).toEqual([])
  })

  it("drains the buffer without waiting", () => {
    const channel = new EventChannel<TestEvent>()
    channel.publish({ n: 1 })
    channel.publish({ n: 2 })

    expect(channel.drain()).toEqual([{ n: 1 }, { n: 2 }])
    expect(channel.drain()).toEqual([])
  })

  it("delivers what is buffered, then ends after close", async () => {
    const channel = new EventChannel<TestEvent>()
    channel.publish({ n: 1 })
    channel.close()

    expect(await channel.next()).toEqual({ value: { n: 1 }, done: false })
    expect(await channel.next()).toEqual({ value: undefined, done: true })
  })

  it("resolves waiting readers as done on close", async () => {
    const channel = new EventChannel<TestEvent>()
    const a = channel.next()
    const b = channel.next()

    channel.close()

    expect(await a).toEqual({ value: undefined, done: true })
    expect(await b).toEqual({ value: undefined, done: true })
    expect(channel.isClosed).toBe(true)
  })

  it("drops events published after close", () => {
    const channel = new EventChannel<TestEvent>()
    channel.close()
    channel.publish({ n: 1 })

    expect(channel.size).toBe(0)
  })

  it("works with for await", async () => {
    const channel = new EventChannel<TestEvent>()
    channel.publish({ n: 1 })
    channel.publish({ n: 2 })
    channel.close()

    const seen: number[] = []
    for await (const event of channel) seen.push(event.n)

    expect(seen).toEqual([1, 2])
  })

  it("closes when the loop breaks early", async () => {
    const channel = new EventChannel<TestEvent>()
    channel.publish({ n: 1 })
    channel.publish({ n: 2 })

    for await (const event of channel) {
      if (event.n === 1) break
    }

    expect(channel.isClosed).toBe(true)
  })
})
