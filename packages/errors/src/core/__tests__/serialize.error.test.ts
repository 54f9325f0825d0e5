import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields without stack by default", () => {
      const err = new BaseError("probe failed", {
        code: "empty_or_corrupt",
        context: { path: "/music/a.mp3" },
        isOperational: false,
      })

      const serialized = serializeError(err)

      expect(serialized).toEqual({
        name: "BaseError",
        code: "empty_or_corrupt",
        message: "probe failed",
        context: { path: "/music/a.mp3" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
      expect("stack" in serialized).toBe(false)
    })

    it("includes stack when requested", () => {
      const err = new BaseError("test", { code: "test" })

      const serialized = serializeError(err, { includeStack: true })

      expect(serialized.stack).toContain("BaseError")
    })

    it("serializes the cause chain recursively", () => {
      const root = new Error("root cause")
      const middle = new BaseError("middle", { code: "mid", cause: root })
      const outer = new BaseError("outer", { code: "outer", cause: middle })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("mid")
      expect(serialized.cause?.cause?.code).toBe("unknown")
      expect(serialized.cause?.cause?.message).toBe("root cause")
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and marks the error non-operational", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.name).toBe("TypeError")
      expect(serialized.code).toBe("unknown")
      expect(serialized.isOperational).toBe(false)
      expect("errno" in serialized).toBe(false)
    })

    it("keeps the Node.js system error code", () => {
      const err = Object.assign(new Error("ENOENT: no such file or directory"), {
        code: "ENOENT",
      })

      expect(serializeError(err).errno).toBe("ENOENT")
    })
  })

  describe("non-Error values", () => {
    it("wraps a string as the message", () => {
      const serialized = serializeError("something went wrong")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("something went wrong")
    })

    it("wraps other values under context.value", () => {
      const serialized = serializeError({ exitCode: 1 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { exitCode: 1 } })
    })
  })
})
