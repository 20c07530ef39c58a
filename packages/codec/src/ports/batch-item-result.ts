import type { AppError } from "@digilock/errors"

export type SuccessfulBatchItem<T> = {
  ok: true
  index: number
  value: T
}

export type FailedBatchItem = {
  ok: false
  index: number
  error: AppError
}

/** Outcome of one element in a collect-all batch call. */
export type BatchItemResult<T> = SuccessfulBatchItem<T> | FailedBatchItem
