import { type CharsetTable, DECIMAL_DIGITS, UnknownCharacterError } from "@digilock/charset"
import { assertLockSequence } from "./lock"
import { decodeData, encodeData } from "./single-codec"

/**
 * Every layer after the first encodes the digits written by the layer before,
 * so layered encoding needs `0`-`9` in the table.
 */
function assertDigitDomain(table: CharsetTable): void {
  const missing = DECIMAL_DIGITS.find((digit) => !table.hasChar(digit))
  if (missing !== undefined) {
    throw new UnknownCharacterError(missing, { layer: 2 })
  }
}

/**
 * Applies {@link encodeData} once per lock, in order.
 *
 * @throws EmptyLockSequenceError
 * @throws UnknownCharacterError before any layer runs when there are several locks
 *   and the table lacks a decimal digit
 */
export function mEncode(table: CharsetTable, locks: readonly number[], text: string): string {
  assertLockSequence(locks)
  if (locks.length > 1) assertDigitDomain(table)

  return locks.reduce((acc, lock) => encodeData(table, acc, lock), text)
}

/**
 * Peels the layers off in reverse lock order.
 *
 * @throws EmptyLockSequenceError
 * @throws UnknownCharacterError before any layer runs, under the same digit rule as {@link mEncode}
 */
export function mDecode(table: CharsetTable, locks: readonly number[], encoded: string): string {
  assertLockSequence(locks)
  if (locks.length > 1) assertDigitDomain(table)

  return locks.reduceRight((acc, lock) => decodeData(table, acc, lock), encoded)
}
