import { describeChain, errnoCode, isAppError } from "@stillframe/errors"
import { ConversionError, type ConversionErrorCode } from "./conversion.errors"

export type CatalogEntry = {
  message: string
  suggestedAction: string
}

export const errorCatalog: Record<ConversionErrorCode, CatalogEntry> = {
  file_not_found: {
    message: "File not found",
    suggestedAction: "Check that the file exists and try again.",
  },
  invalid_format: {
    message: "Unsupported file format",
    suggestedAction: "Only MP3 files are supported. Check the file type.",
  },
  empty_or_corrupt: {
    message: "The file may be empty or corrupted",
    suggestedAction: "Try another MP3 file or check the original.",
  },
  too_large: {
    message: "The file is too large",
    suggestedAction: "Use a file within the size limit.",
  },
  permission_denied: {
    message: "The file cannot be accessed",
    suggestedAction: "Check the file's read permissions.",
  },
  transcoder_unavailable: {
    message: "The conversion tool is not available",
    suggestedAction: "Install ffmpeg or set FFMPEG_PATH, then restart.",
  },
  transcoding_failed: {
    message: "The conversion failed",
    suggestedAction: "Wait a moment and try again.",
  },
  disk_space_low: {
    message: "Not enough disk space",
    suggestedAction: "Free up disk space and try again.",
  },
  output_directory_invalid: {
    message: "There is a problem with the output folder",
    suggestedAction: "Choose a writable folder.",
  },
  invalid_settings: {
    message: "There is a problem with the settings",
    suggestedAction: "Review and correct the settings.",
  },
  resource_exhausted: {
    message: "System resources are exhausted",
    suggestedAction: "Close other applications and try again.",
  },
  cancelled: {
    message: "The operation was cancelled",
    suggestedAction: "Restart the operation if needed.",
  },
  unexpected: {
    message: "An unexpected error occurred",
    suggestedAction: "Restart the application and try again.",
  },
}

export type ErrorDescription = Readonly<{
  code: ConversionErrorCode
  message: string
  suggestedAction: string
  technicalDetails?: string
  context: Readonly<Record<string, unknown>>
}>

function isConversionErrorCode(code: string): code is ConversionErrorCode {
  return Object.hasOwn(errorCatalog, code)
}

function pathOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "path" in err && typeof err.path === "string") {
    return err.path
  }
  return "unknown"
}

/**
 * Maps any thrown value onto the conversion taxonomy.
 */
export function toConversionError(err: unknown): ConversionError {
  if (err instanceof ConversionError) return err

  switch (errnoCode(err)) {
    case "ENOENT":
      return ConversionError.fileNotFound(pathOf(err), err)
    case "EACCES":
    case "EPERM":
      return ConversionError.permissionDenied(pathOf(err), err)
    case "ENOSPC":
      return ConversionError.diskSpaceLow(undefined, err)
    case "EMFILE":
    case "ENFILE":
    case "ENOMEM":
      return ConversionError.resourceExhausted(err)
  }

  if (isAppError(err) && isConversionErrorCode(err.code)) {
    return new ConversionError(err.message, err.code, { context: { ...err.context }, cause: err })
  }

  return ConversionError.unexpected(err)
}

export function describeError(err: unknown): ErrorDescription {
  const error = toConversionError(err)
  const entry = errorCatalog[error.code]
  const technicalDetails = error.diagnostic ?? describeChain(error)

  return {
    code: error.code,
    message: entry.message,
    suggestedAction: entry.suggestedAction,
    ...(technicalDetails !== "" && { technicalDetails }),
    context: error.context,
  }
}

export type FormatErrorOptions = {
  /** @default false */
  includeTechnical?: boolean
}

export function formatErrorMessage(
  description: ErrorDescription,
  options: FormatErrorOptions = {},
): string {
  const parts = [description.message, description.suggestedAction]

  if (options.includeTechnical && description.technicalDetails) {
    parts.push(`Technical details: ${description.technicalDetails}`)
  }

  return parts.join("\n\n")
}
