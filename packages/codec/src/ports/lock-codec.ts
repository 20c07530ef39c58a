import type { BatchItemResult } from "./batch-item-result"

/**
 * Codec bound to a charset provider.
 *
 * @remarks
 * Single and batch calls take an optional lock that falls back to the codec's
 * default lock. Each call reads the charset once, so a table swapped in
 * mid-call is only seen by later calls.
 */
export interface LockCodec {
  readonly defaultLock: number | undefined

  encodeData(text: string, lock?: number): string
  decodeData(encoded: string, lock?: number): string

  /** Decode under `fromLock`, re-encode under `toLock`. */
  convertData(encoded: string, fromLock: number, toLock: number): string

  encodeBatch(texts: readonly string[], lock?: number): string[]
  decodeBatch(encoded: readonly string[], lock?: number): string[]
  tryEncodeBatch(texts: readonly string[], lock?: number): BatchItemResult<string>[]
  tryDecodeBatch(encoded: readonly string[], lock?: number): BatchItemResult<string>[]

  /** Layered encode: one pass per lock, in order. */
  mEncode(locks: readonly number[], text: string): string

  /** Layered decode: one pass per lock, in reverse order. */
  mDecode(locks: readonly number[], encoded: string): string
}

export type CodecOperation = Exclude<keyof LockCodec, "defaultLock">
