import { BaseError, type ErrorContext } from "@digilock/errors"

export type CharsetErrorCode =
  | "unknown_character"
  | "unknown_code"
  | "table_not_initialized"
  | "invalid_charset"
  | "charset_load_failed"

function codePointLabel(char: string): string {
  const cp = char.codePointAt(0) ?? 0
  return `U+${cp.toString(16).toUpperCase().padStart(4, "0")}`
}

export class UnknownCharacterError extends BaseError<"unknown_character"> {
  readonly char: string

  constructor(char: string, context: ErrorContext = {}) {
    super(`Character ${JSON.stringify(char)} (${codePointLabel(char)}) is not in the charset`, {
      code: "unknown_character",
      category: "configuration",
      context: { ...context, char, codePoint: codePointLabel(char) },
    })
    this.char = char
  }
}

export class UnknownCodeError extends BaseError<"unknown_code"> {
  readonly charCode: number

  constructor(code: number, context: ErrorContext = {}) {
    super(`Code ${code} has no character in the charset`, {
      code: "unknown_code",
      category: "configuration",
      context: { ...context, code },
    })
    this.charCode = code
  }
}

export class TableNotInitializedError extends BaseError<"table_not_initialized"> {
  constructor() {
    super("No charset table has been loaded", {
      code: "table_not_initialized",
      category: "configuration",
    })
  }
}

export class InvalidCharsetError extends BaseError<"invalid_charset"> {
  constructor(reason: string, context: ErrorContext = {}) {
    super(`Invalid charset: ${reason}`, {
      code: "invalid_charset",
      category: "configuration",
      context,
    })
  }
}

export class CharsetLoadError extends BaseError<"charset_load_failed"> {
  constructor(message: string, source: string, options: { cause?: unknown; context?: ErrorContext } = {}) {
    super(message, {
      code: "charset_load_failed",
      category: "configuration",
      context: { ...options.context, source },
      cause: options.cause,
    })
  }
}
