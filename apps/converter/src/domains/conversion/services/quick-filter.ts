import fs, { type Stats } from "node:fs"
import path from "node:path"
import { errnoCode } from "@stillframe/errors"
import type { QuickFilterError, QuickFilterResult } from "../model/validation.model"

export const DEFAULT_MAX_BYTES = 1024 ** 3

export type StatFn = (filePath: string) => Stats

export type QuickFilterOptions = {
  /** @default 1 GiB */
  maxBytes?: number
  /** @default fs.statSync */
  stat?: StatFn
}

const UNITS = ["bytes", "KB", "MB", "GB", "TB"] as const

/**
 * `1073741824` -> `"1 GB"`, `1572864` -> `"1.5 MB"`.
 */
export function formatByteLimit(bytes: number): string {
  let value = bytes
  let unit = 0

  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit++
  }

  const rounded = Number.isInteger(value) ? String(value) : value.toFixed(1).replace(/\.0$/, "")
  return `${rounded} ${UNITS[unit]}`
}

function checkFile(filePath: string, stat: StatFn, maxBytes: number): string | undefined {
  let stats: Stats

  try {
    stats = stat(filePath)
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return "File does not exist"
    return `Error: ${err instanceof Error ? err.message : String(err)}`
  }

  if (!stats.isFile()) return "Not a file"
  if (path.extname(filePath).toLowerCase() !== ".mp3") return "Not an MP3 file"
  if (stats.size === 0) return "File is empty"
  if (stats.size > maxBytes) return `File is too large (limit: ${formatByteLimit(maxBytes)})`

  return undefined
}

/**
 * Cheap synchronous pre-check run before probing. Reads file metadata only.
 */
export function quickFilter(
  paths: readonly string[],
  options: QuickFilterOptions = {},
): QuickFilterResult {
  const stat = options.stat ?? fs.statSync
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES

  const valid: string[] = []
  const errors: QuickFilterError[] = []

  for (const filePath of paths) {
    const message = checkFile(filePath, stat, maxBytes)

    if (message === undefined) valid.push(filePath)
    else errors.push({ path: filePath, message })
  }

  return { valid, errors }
}
