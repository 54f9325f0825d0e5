import { describe, expect, it } from "vitest"
import { logDestination } from "../core"

describe("logDestination", () => {
  const logging = { level: "info", prettify: false, serviceName: "stillframe" } as const

  it("sends JSON lines to stderr", () => {
    expect(logDestination(logging)).toMatchObject({ fd: 2 })
  })

  it("leaves pretty output to its transport", () => {
    expect(logDestination({ ...logging, prettify: true })).toBeUndefined()
  })
})
