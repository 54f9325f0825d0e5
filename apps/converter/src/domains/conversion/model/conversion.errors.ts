import { BaseError } from "@stillframe/errors"

export type ConversionErrorCode =
  | "file_not_found"
  | "invalid_format"
  | "empty_or_corrupt"
  | "too_large"
  | "permission_denied"
  | "transcoder_unavailable"
  | "transcoding_failed"
  | "disk_space_low"
  | "output_directory_invalid"
  | "invalid_settings"
  | "resource_exhausted"
  | "cancelled"
  | "unexpected"

export type ConversionErrorOptions = {
  context?: Record<string, unknown>
  cause?: unknown
  /** Raw tool output (ffmpeg stderr tail) kept for technical display. */
  diagnostic?: string
}

export class ConversionError extends BaseError<ConversionErrorCode> {
  readonly diagnostic?: string

  constructor(
    message: string,
    code: ConversionErrorCode,
    options: ConversionErrorOptions & { isRetryable?: boolean } = {},
  ) {
    super(message, {
      code,
      context: options.context,
      cause: options.cause,
      isRetryable: options.isRetryable ?? false,
    })

    if (options.diagnostic !== undefined) {
      this.diagnostic = options.diagnostic
    }
  }

  static fileNotFound(path: string, cause?: unknown): ConversionError {
    return new ConversionError(`File not found: ${path}`, "file_not_found", {
      context: { path },
      cause,
    })
  }

  static invalidFormat(path: string, reason = "not an MP3 file"): ConversionError {
    return new ConversionError(`Unsupported format (${reason}): ${path}`, "invalid_format", {
      context: { path, reason },
    })
  }

  static emptyOrCorrupt(path: string, reason: string, cause?: unknown): ConversionError {
    return new ConversionError(`Empty or corrupt file (${reason}): ${path}`, "empty_or_corrupt", {
      context: { path, reason },
      cause,
    })
  }

  static tooLarge(path: string, sizeBytes: number, maxBytes: number): ConversionError {
    return new ConversionError(
      `File exceeds the ${maxBytes} byte limit (${sizeBytes} bytes): ${path}`,
      "too_large",
      { context: { path, sizeBytes, maxBytes } },
    )
  }

  static permissionDenied(path: string, cause?: unknown): ConversionError {
    return new ConversionError(`Permission denied: ${path}`, "permission_denied", {
      context: { path },
      cause,
    })
  }

  static transcoderUnavailable(cause?: unknown): ConversionError {
    return new ConversionError("ffmpeg is not available", "transcoder_unavailable", { cause })
  }

  static transcodingFailed(
    diagnostic: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
  ): ConversionError {
    return new ConversionError("ffmpeg conversion failed", "transcoding_failed", {
      context,
      cause,
      diagnostic,
      isRetryable: true,
    })
  }

  static diskSpaceLow(path?: string, cause?: unknown): ConversionError {
    return new ConversionError("No space left on device", "disk_space_low", {
      context: path === undefined ? {} : { path },
      cause,
    })
  }

  static insufficientSpace(
    directory: string,
    freeBytes: number,
    requiredBytes: number,
  ): ConversionError {
    const mb = (bytes: number) => bytes / (1024 * 1024)

    return new ConversionError(
      `Insufficient disk space: ${mb(freeBytes).toFixed(1)}MB free (minimum ${mb(requiredBytes)}MB required)`,
      "disk_space_low",
      { context: { directory, freeBytes, requiredBytes } },
    )
  }

  static outputDirectoryInvalid(directory: string, cause?: unknown): ConversionError {
    return new ConversionError(
      `Output directory is not usable: ${directory}`,
      "output_directory_invalid",
      { context: { directory }, cause },
    )
  }

  static invalidSettings(setting: string, value: unknown, reason: string): ConversionError {
    return new ConversionError(`Invalid ${setting}: ${reason}`, "invalid_settings", {
      context: { setting, value },
    })
  }

  static resourceExhausted(cause?: unknown): ConversionError {
    return new ConversionError("System resources exhausted", "resource_exhausted", {
      cause,
      isRetryable: true,
    })
  }

  static cancelled(context: Record<string, unknown> = {}): ConversionError {
    return new ConversionError("Conversion was cancelled", "cancelled", { context })
  }

  static unexpected(cause: unknown): ConversionError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new ConversionError(`Unexpected error: ${detail}`, "unexpected", { cause })
  }
}

export class JobStateError extends BaseError<"illegal_transition"> {
  static illegalTransition(jobId: string, operation: string, status: string): JobStateError {
    return new JobStateError(`Cannot ${operation} job ${jobId} while ${status}`, {
      code: "illegal_transition",
      context: { jobId, operation, status },
      isOperational: false,
    })
  }
}
