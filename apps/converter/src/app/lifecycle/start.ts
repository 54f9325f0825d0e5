import fs, { constants } from "node:fs/promises"
import { ConversionError } from "../../domains/conversion/model/conversion.errors"
import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

export const MIN_FREE_BYTES = 100 * 1024 * 1024

export type OutputDirectoryFs = {
  /** Creates the directory and its parents. */
  create(directory: string): Promise<void>
  /** Rejects unless the current process may write into the directory. */
  assertWritable(directory: string): Promise<void>
  freeBytes(directory: string): Promise<number>
}

export const nodeOutputDirectoryFs: OutputDirectoryFs = {
  create: async (directory) => {
    await fs.mkdir(directory, { recursive: true })
  },
  assertWritable: (directory) => fs.access(directory, constants.W_OK),
  freeBytes: async (directory) => {
    const stats = await fs.statfs(directory)
    return stats.bavail * stats.bsize
  },
}

/**
 * @throws {ConversionError} `output_directory_invalid` when the folder cannot be created or written
 * @throws {ConversionError} `disk_space_low` below `minFreeBytes`
 */
export async function prepareOutputDirectory(
  directory: string,
  fileSystem: OutputDirectoryFs = nodeOutputDirectoryFs,
  minFreeBytes: number = MIN_FREE_BYTES,
): Promise<void> {
  let freeBytes: number

  try {
    await fileSystem.create(directory)
    await fileSystem.assertWritable(directory)
    freeBytes = await fileSystem.freeBytes(directory)
  } catch (err) {
    throw ConversionError.outputDirectoryInvalid(directory, err)
  }

  if (freeBytes < minFreeBytes) {
    throw ConversionError.insufficientSpace(directory, freeBytes, minFreeBytes)
  }
}

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const hooks: LifecycleHook[] = []
  const directory = context.config.output.directory

  if (directory !== undefined) {
    hooks.push({
      name: "start:output-directory",
      fn: () => prepareOutputDirectory(directory),
    })
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
