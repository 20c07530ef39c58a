export type ErrorCode = Lowercase<string>

/**
 * Coarse classification of a failure, for callers that branch on *who* has to act.
 *
 * - `configuration`: the charset or settings are wrong or missing
 * - `input`: the data handed to an operation is malformed
 * - `usage`: the operation was called incorrectly
 * - `internal`: anything unexpected
 */
export type ErrorCategory = "configuration" | "input" | "usage" | "internal"

export const errorCategories: readonly ErrorCategory[] = [
  "configuration",
  "input",
  "usage",
  "internal",
]

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (characters, codes, indexes) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  readonly category: ErrorCategory

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  category: ErrorCategory
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
