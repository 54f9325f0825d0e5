import type { ConversionError } from "./conversion.errors"
import type { ErrorDescription } from "./error-catalog"
import type { AudioDescriptor } from "./media.model"

export interface AudioValidator {
  /**
   * Rejects with a {@link ConversionError} coded `file_not_found`, `invalid_format`,
   * `empty_or_corrupt`, `too_large` or `permission_denied`.
   */
  validate(path: string): Promise<AudioDescriptor>
}

export type InvalidFile = {
  path: string
  message: string
  error: ErrorDescription
}

export type ValidationReport = {
  valid: AudioDescriptor[]
  invalid: InvalidFile[]
}

export type QuickFilterError = {
  path: string
  message: string
}

export type QuickFilterResult = {
  valid: string[]
  errors: QuickFilterError[]
}
