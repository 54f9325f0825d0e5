import { BaseError } from "@stillframe/errors"

export class ConfigError extends BaseError<"invalid_settings"> {
  static validation(details: string, issues: number): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "invalid_settings",
      context: { issues },
    })
  }

  static unreadableSource(source: string, reason: string, cause?: unknown): ConfigError {
    return new ConfigError(`Configuration source ${source} is unreadable: ${reason}`, {
      code: "invalid_settings",
      context: { source },
      cause,
    })
  }
}
