import fs from "node:fs/promises"
import path from "node:path"
import { errnoCode } from "@stillframe/errors"
import { ConfigError } from "../../core/config-error"
import type { ConfigSource } from "../../ports/source"

export type JsonKeyCase = "preserve" | "upper-snake"

export type JsonSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string

  /** When false a missing file yields no values. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * "upper-snake" rewrites top-level keys so a settings file written as
   * `maxConcurrentConversions` or `max_concurrent_conversions` lines up with
   * the env-style `MAX_CONCURRENT_CONVERSIONS`.
   *
   * @default "preserve"
   */
  keyCase?: JsonKeyCase
}

export function toUpperSnake(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[\s.-]+/g, "_")
    .toUpperCase()
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && errnoCode(err) === "ENOENT") return {}
      throw err
    }

    const parsed = this.parse(content)

    if (this.opts.keyCase !== "upper-snake") return parsed

    const out: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(parsed)) {
      out[toUpperSnake(key)] = value
    }
    return out
  }

  private parse(content: string): Record<string, unknown> {
    let parsed: unknown

    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw ConfigError.unreadableSource(this.name, "invalid JSON", err)
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw ConfigError.unreadableSource(this.name, "expected a JSON object")
    }

    return { ...parsed }
  }
}
