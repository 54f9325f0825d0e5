import fs from "node:fs/promises"
import path from "node:path"
import type { Clock } from "@stillframe/clock"
import { errnoCode } from "@stillframe/errors"
import { ConversionError } from "../model/conversion.errors"
import type { AudioDescriptor, OutputSpec, Resolution } from "../model/media.model"

export type OutputSettings = {
  /** When unset, the output goes beside the input. */
  directory?: string
  /** `{original_name}` is replaced by the input stem, `{timestamp}` by `YYYYMMDD_HHMMSS`. */
  filenameTemplate: string
  resolution: Resolution
  fps: number
  backgroundColor: string
}

export const defaultOutputSettings: OutputSettings = {
  filenameTemplate: "{original_name}_video",
  resolution: { width: 1280, height: 720 },
  fps: 30,
  backgroundColor: "#000000",
}

export type PlanOutputOptions = {
  /** Moment `{timestamp}` stands for */
  now?: Date
  /** True for paths already in use; the name is then numbered `stem_1.mp4`, `stem_2.mp4`... */
  isTaken?: (candidate: string) => boolean
}

const EXTENSION = ".mp4"

const pad = (n: number) => String(n).padStart(2, "0")

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`

  return `${day}_${time}`
}

export function planOutput(
  input: Pick<AudioDescriptor, "path">,
  settings: OutputSettings = defaultOutputSettings,
  options: PlanOutputOptions = {},
): OutputSpec {
  const parsed = path.parse(input.path)
  const { filenameTemplate } = settings

  let name = filenameTemplate.replaceAll("{original_name}", parsed.name)
  if (filenameTemplate.includes("{timestamp}")) {
    name = name.replaceAll("{timestamp}", formatTimestamp(options.now ?? new Date()))
  }

  const preferred = name.endsWith(EXTENSION) ? name : `${name}${EXTENSION}`
  const stem = preferred.slice(0, -EXTENSION.length)
  const directory = settings.directory ?? parsed.dir
  const isTaken = options.isTaken ?? (() => false)

  let filename = preferred
  for (let counter = 1; isTaken(path.join(directory, filename)); counter++) {
    filename = `${stem}_${counter}${EXTENSION}`
  }

  return {
    path: path.join(directory, filename),
    filename,
    resolution: { ...settings.resolution },
    fps: settings.fps,
    backgroundColor: settings.backgroundColor,
  }
}

export type OutputPlannerDeps = {
  clock: Clock
  /** Entry names in a directory; `[]` when it does not exist yet. */
  listDirectory?: (directory: string) => Promise<readonly string[]>
}

export type PlannedOutput<T> = {
  input: T
  output: OutputSpec
}

async function readDirectory(directory: string): Promise<readonly string[]> {
  try {
    return await fs.readdir(directory)
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return []
    throw ConversionError.outputDirectoryInvalid(directory, err)
  }
}

/**
 * Plans the outputs of one batch. A path is never handed out twice: names already on
 * disk and names planned earlier in the batch are both skipped.
 */
export class OutputPlanner {
  constructor(
    private readonly deps: OutputPlannerDeps,
    readonly settings: OutputSettings,
  ) {}

  /**
   * @throws {ConversionError} `output_directory_invalid` when a target directory cannot be listed
   */
  async planBatch<T extends Pick<AudioDescriptor, "path">>(
    inputs: readonly T[],
  ): Promise<PlannedOutput<T>[]> {
    const listDirectory = this.deps.listDirectory ?? readDirectory
    const now = this.deps.clock.now()
    const taken = new Set<string>()
    const scanned = new Set<string>()
    const planned: PlannedOutput<T>[] = []

    for (const input of inputs) {
      const directory = this.settings.directory ?? path.dirname(input.path)

      if (!scanned.has(directory)) {
        scanned.add(directory)
        for (const name of await listDirectory(directory)) taken.add(path.join(directory, name))
      }

      const output = planOutput(input, this.settings, { now, isTaken: (c) => taken.has(c) })
      taken.add(output.path)
      planned.push({ input, output })
    }

    return planned
  }
}
