import { BaseError, toAppError } from "@digilock/errors"

export type CodecErrorCode =
  | "malformed_length"
  | "malformed_digits"
  | "lock_overflow"
  | "empty_lock_sequence"
  | "lock_required"
  | "invalid_lock"
  | "batch_item_failed"

export class MalformedLengthError extends BaseError<"malformed_length"> {
  constructor(length: number, codeWidth: number) {
    super(`Encoded length ${length} is not a multiple of the code width ${codeWidth}`, {
      code: "malformed_length",
      category: "input",
      context: { length, codeWidth },
    })
  }
}

export class MalformedDigitsError extends BaseError<"malformed_digits"> {
  constructor(group: string, index: number) {
    super(`Group ${index} (${JSON.stringify(group)}) is not a run of decimal digits`, {
      code: "malformed_digits",
      category: "input",
      context: { group, index },
    })
  }
}

export type LockOverflowDetails = {
  char: string
  code: number
  lock: number
  codeWidth: number
}

export class LockOverflowError extends BaseError<"lock_overflow"> {
  constructor(details: LockOverflowDetails) {
    const { char, code, lock, codeWidth } = details
    super(
      `Lock ${lock} moves ${JSON.stringify(char)} (code ${code}) outside ${codeWidth} digits`,
      {
        code: "lock_overflow",
        category: "input",
        context: { ...details },
      },
    )
  }
}

export class EmptyLockSequenceError extends BaseError<"empty_lock_sequence"> {
  constructor() {
    super("Lock sequence must not be empty", {
      code: "empty_lock_sequence",
      category: "usage",
    })
  }
}

export class LockRequiredError extends BaseError<"lock_required"> {
  constructor() {
    super("No lock given and the codec has no default lock", {
      code: "lock_required",
      category: "usage",
    })
  }
}

export class InvalidLockError extends BaseError<"invalid_lock"> {
  constructor(lock: unknown) {
    super(`Lock must be a safe integer (got ${String(lock)})`, {
      code: "invalid_lock",
      category: "usage",
      context: { lock },
    })
  }
}

/**
 * Wraps the first failing element of a fail-fast batch call.
 * Takes its category from the element's own error.
 */
export class BatchItemError extends BaseError<"batch_item_failed"> {
  readonly index: number

  constructor(index: number, cause: unknown) {
    const item = toAppError(cause)
    super(`Batch item ${index} failed: ${item.message}`, {
      code: "batch_item_failed",
      category: item.category,
      context: { index, causeCode: item.code, causeCategory: item.category },
      cause: item,
      isOperational: item.isOperational,
    })
    this.index = index
  }
}
