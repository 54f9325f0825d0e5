import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  setup?: (cwd: string) => Promise<void>
  make: (cwd: string) => ConfigSource
  expected: Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "stillframe-config-"))
      await h.setup?.(cwd)
      source = h.make(cwd)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a non-empty name", () => {
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("resolves to a plain object", async () => {
      const result = await source.load()

      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("returns the expected values", async () => {
      expect(await source.load()).toEqual(h.expected)
    })

    it("returns a fresh object on every load", async () => {
      const first = await source.load()
      first.INJECTED = "x"

      const second = await source.load()

      expect(second).not.toHaveProperty("INJECTED")
      expect(second).toEqual(h.expected)
    })
  })
}
