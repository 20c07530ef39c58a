export {
  decodeBatch,
  encodeBatch,
  tryDecodeBatch,
  tryEncodeBatch,
} from "./core/batch-codec"
export {
  BatchItemError,
  type CodecErrorCode,
  EmptyLockSequenceError,
  InvalidLockError,
  type LockOverflowDetails,
  LockOverflowError,
  LockRequiredError,
  MalformedDigitsError,
  MalformedLengthError,
} from "./core/errors"
export { createLockCodec, type LockCodecDeps } from "./core/lock-codec"
export { mDecode, mEncode } from "./core/multi-lock-codec"
export { convertData, countChars, decodeData, encodeData } from "./core/single-codec"
export type {
  BatchItemResult,
  FailedBatchItem,
  SuccessfulBatchItem,
} from "./ports/batch-item-result"
export type { CodecOperation, LockCodec } from "./ports/lock-codec"
