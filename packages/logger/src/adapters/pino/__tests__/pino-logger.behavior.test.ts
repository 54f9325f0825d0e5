import { Writable } from "node:stream"

import { PinoLogger } from "../pino-logger"

function lineDestination() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const text = String(chunk).trim()
      if (text) lines.push(JSON.parse(text))
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("writes pino JSON to the injected destination", () => {
    const { lines, destination } = lineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { service: "stillframe" },
    )

    logger.info("job started", { jobId: "job_1" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "job started",
      level: 30,
      service: "stillframe",
      jobId: "job_1",
    })
    expect(typeof lines[0]?.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = lineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("conversion failed", {
      err: new Error("ffmpeg exited with code 1", { cause: new Error("No space left on device") }),
    })

    expect(lines[0]?.err).toMatchObject({
      type: "Error",
      message: "ffmpeg exited with code 1",
      cause: { type: "Error", message: "No space left on device" },
    })
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = lineDestination()

    const child = new PinoLogger({ destination }, { level: "warn" }, { component: "scheduler" })
      .child({ jobId: "job_7" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({ msg: "logged", component: "scheduler", jobId: "job_7" })
  })
})
