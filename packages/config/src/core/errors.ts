import { BaseError } from "@digilock/errors"

export type ConfigIssue = { path: string; message: string }

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(message: string, issues: ConfigIssue[]) {
    super(message, {
      code: "config_invalid",
      category: "configuration",
      context: { issues },
    })
  }
}

/** A config source that exists but cannot be read as configuration. */
export class ConfigSourceError extends BaseError<"config_source_invalid"> {
  readonly source: string

  constructor(message: string, source: string, options: { cause?: unknown } = {}) {
    super(message, {
      code: "config_source_invalid",
      category: "configuration",
      context: { source },
      cause: options.cause,
    })
    this.source = source
  }
}
