export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { isAppError } from "./core/utils/is-app-error"
export { type ToAppErrorFallback, toAppError } from "./core/utils/to-app-error"
export {
  type AppError,
  type ErrorCategory,
  type ErrorCode,
  type ErrorContext,
  errorCategories,
  type SerializedError,
} from "./ports/error"
