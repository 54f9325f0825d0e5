import { beforeEach, describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import { audio } from "../../../../tests/fixtures"
import type { Mock } from "../../../../tests/mock"
import { RecordingLogger } from "../../../../tests/recording-logger"
import { ConversionError } from "../../model/conversion.errors"
import type { ValidationEvent } from "../../model/events.model"
import type { AudioValidator } from "../../model/validation.model"
import { EventChannel } from "../event-channel"
import { ValidationController } from "../validation-controller"

describe("ValidationController", () => {
  let logger: RecordingLogger
  let validator: Mock<AudioValidator>
  let events: EventChannel<ValidationEvent>
  let controller: ValidationController

  beforeEach(() => {
    logger = new RecordingLogger()
    validator = mock<AudioValidator>()
    events = new EventChannel()
    controller = new ValidationController({ logger, validator, events }, { maxBytes: 1024 })
  })

  const givenFiles = (outcomes: Record<string, Error | undefined>) => {
    validator.validate.mockImplementation(async (path) => {
      const error = outcomes[path]
      if (error) throw error
      return audio(path)
    })
  }

  describe("validate()", () => {
    it("splits files into valid and invalid, keeping input order", async () => {
      givenFiles({
        "/music/a.mp3": undefined,
        "/music/b.mp3": ConversionError.emptyOrCorrupt("/music/b.mp3", "no audio stream"),
        "/music/c.mp3": undefined,
      })

      const report = await controller.validate(["/music/a.mp3", "/music/b.mp3", "/music/c.mp3"])

      expect(report.valid.map((a) => a.path)).toEqual(["/music/a.mp3", "/music/c.mp3"])
      expect(report.invalid).toEqual([
        {
          path: "/music/b.mp3",
          message: "The file may be empty or corrupted",
          error: expect.objectContaining({
            code: "empty_or_corrupt",
            suggestedAction: "Try another MP3 file or check the original.",
          }),
        },
      ])
    })

    it("starts every file before any finishes", async () => {
      const release: Array<() => void> = []
      validator.validate.mockImplementation(
        (path) =>
          new Promise((resolve) => {
            release.push(() => resolve(audio(path)))
          }),
      )

      const pending = controller.validate(["/music/a.mp3", "/music/b.mp3"])

      expect(validator.validate).toHaveBeenCalledTimes(2)
      expect(events.drain()).toEqual([
        { kind: "validation_started", path: "/music/a.mp3" },
        { kind: "validation_started", path: "/music/b.mp3" },
      ])

      for (const r of release) r()
      await pending
    })

    it("publishes a result event per file", async () => {
      givenFiles({
        "/music/a.mp3": undefined,
        "/music/gone.mp3": ConversionError.fileNotFound("/music/gone.mp3"),
      })

      await controller.validate(["/music/a.mp3", "/music/gone.mp3"])

      const results = events.drain().filter((e) => e.kind !== "validation_started")

      expect(results).toEqual([
        { kind: "validation_succeeded", path: "/music/a.mp3", audio: audio("/music/a.mp3") },
        {
          kind: "validation_failed",
          path: "/music/gone.mp3",
          message: "File not found",
          error: expect.objectContaining({ code: "file_not_found" }),
        },
      ])
    })

    it("maps unknown failures to unexpected without failing the batch", async () => {
      givenFiles({ "/music/a.mp3": new TypeError("probe output was not JSON") })

      const report = await controller.validate(["/music/a.mp3"])

      expect(report.valid).toEqual([])
      expect(report.invalid[0]?.error.code).toBe("unexpected")
      expect(report.invalid[0]?.error.technicalDetails).toBe(
        "ConversionError: Unexpected error: probe output was not JSON <- TypeError: probe output was not JSON",
      )
    })

    it("logs each rejection as a warning", async () => {
      givenFiles({ "/music/a.mp3": ConversionError.invalidFormat("/music/a.mp3") })

      await controller.validate(["/music/a.mp3"])

      expect(logger.entries).toContainEqual({
        level: "warn",
        message: "Validation failed",
        meta: expect.objectContaining({
          component: "validation-controller",
          inputPath: "/music/a.mp3",
          code: "invalid_format",
        }),
      })
    })

    it("returns an empty report for no paths", async () => {
      expect(await controller.validate([])).toEqual({ valid: [], invalid: [] })
      expect(events.size).toBe(0)
    })
  })

  describe("quickFilter()", () => {
    it("runs with the injected stat function", () => {
      const stat = () => {
        throw new Error("stat failed")
      }
      const filtering = new ValidationController(
        { logger, validator, events, stat },
        { maxBytes: 1024 },
      )

      expect(filtering.quickFilter(["/music/a.mp3"])).toEqual({
        valid: [],
        errors: [{ path: "/music/a.mp3", message: "Error: stat failed" }],
      })
    })
  })
})
