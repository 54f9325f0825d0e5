import { describe, expect, it } from "vitest"
import { parseCliArgs, UsageError } from "../args"

describe("parseCliArgs", () => {
  it("collects files and maps options onto setting overrides", () => {
    expect(
      parseCliArgs([
        "-o", "/videos",
        "-c", "3",
        "--fps", "24",
        "-r", "1920x1080",
        "-b", "#ffffff",
        "-s", "custom.json",
        "-v",
        "a.mp3",
        "b.mp3",
      ]),
    ).toEqual({
      files: ["a.mp3", "b.mp3"],
      overrides: {
        OUTPUT_DIR: "/videos",
        MAX_CONCURRENT_CONVERSIONS: "3",
        VIDEO_RESOLUTION: "1920x1080",
        VIDEO_FPS: "24",
        BACKGROUND_COLOR: "#ffffff",
      },
      settingsFile: "custom.json",
      verbose: true,
      help: false,
    })
  })

  it("leaves everything unset by default", () => {
    expect(parseCliArgs(["a.mp3"])).toEqual({
      files: ["a.mp3"],
      overrides: {},
      verbose: false,
      help: false,
    })
  })

  it("accepts long option names", () => {
    const options = parseCliArgs(["--output-dir", "/videos", "--concurrency", "2", "--help"])

    expect(options.overrides).toEqual({ OUTPUT_DIR: "/videos", MAX_CONCURRENT_CONVERSIONS: "2" })
    expect(options.help).toBe(true)
    expect(options.files).toEqual([])
  })

  it.each([[["--loud", "a.mp3"]], [["--fps"]]])("rejects %j", (argv) => {
    expect(() => parseCliArgs(argv)).toThrow(UsageError)
  })
})
