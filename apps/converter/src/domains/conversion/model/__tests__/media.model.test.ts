import { describe, expect, it } from "vitest"
import { ConversionError } from "../conversion.errors"
import { formatResolution, parseResolution } from "../media.model"

describe("parseResolution", () => {
  it("parses WIDTHxHEIGHT", () => {
    expect(parseResolution("1920x1080")).toEqual({ width: 1920, height: 1080 })
  })

  it("ignores surrounding whitespace", () => {
    expect(parseResolution(" 640x480 ")).toEqual({ width: 640, height: 480 })
  })

  it.each(["1920", "1920x", "x1080", "1920X1080", "wide x tall", ""])(
    "rejects %j",
    (value) => {
      expect(() => parseResolution(value)).toThrow(ConversionError)
    },
  )

  it("rejects zero dimensions", () => {
    try {
      parseResolution("0x720")
      expect.unreachable()
    } catch (err) {
      expect(err).toMatchObject({
        code: "invalid_settings",
        message: "Invalid resolution: dimensions must be positive",
        context: { setting: "resolution", value: "0x720" },
      })
    }
  })

  it("round-trips through formatResolution", () => {
    expect(formatResolution(parseResolution("1280x720"))).toBe("1280x720")
  })
})
