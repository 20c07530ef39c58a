import type { AppError, ErrorCategory, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

export type ToAppErrorFallback = {
  /** @default "unknown" */
  code?: ErrorCode

  /** @default "internal" */
  category?: ErrorCategory
}

/**
 * Normalize a caught value so callers can always read `code` and `category`.
 *
 * `BaseError` instances pass through. Anything else becomes a non-operational
 * `BaseError` carrying `fallback`: an `Error` as its cause, a string as its
 * message, other values under `context.value`.
 */
export function toAppError(err: unknown, fallback: ToAppErrorFallback = {}): AppError {
  if (err instanceof BaseError) return err

  const code = fallback.code ?? "unknown"
  const category = fallback.category ?? "internal"

  if (err instanceof Error) {
    return new BaseError(err.message, { code, category, cause: err, isOperational: false })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code, category, isOperational: false })
  }

  return new BaseError("Unknown error", {
    code,
    category,
    context: { value: err },
    isOperational: false,
  })
}
