import { type CharsetTable, maxForWidth } from "@digilock/charset"
import { LockOverflowError, MalformedDigitsError, MalformedLengthError } from "./errors"
import { assertLock } from "./lock"

const DIGIT_GROUP = /^[0-9]+$/

/**
 * Encodes `text` one character (code point) at a time: the character's code
 * plus `lock`, zero-padded to the table's code width.
 *
 * Nothing is returned unless every character encodes.
 *
 * @throws UnknownCharacterError for a character outside the table
 * @throws LockOverflowError when `code + lock` leaves `[0, 10^codeWidth - 1]`
 * @throws InvalidLockError
 */
export function encodeData(table: CharsetTable, text: string, lock: number): string {
  assertLock(lock)

  const { codeWidth } = table
  const max = maxForWidth(codeWidth)
  let encoded = ""

  for (const char of text) {
    const code = table.lookupCode(char)
    const shifted = code + lock

    if (shifted < 0 || shifted > max || !Number.isSafeInteger(shifted)) {
      throw new LockOverflowError({ char, code, lock, codeWidth })
    }

    encoded += String(shifted).padStart(codeWidth, "0")
  }

  return encoded
}

/**
 * Inverse of {@link encodeData}.
 *
 * @throws MalformedLengthError
 * @throws MalformedDigitsError for a group holding anything but ASCII digits
 * @throws UnknownCodeError when `group - lock` maps to no character
 * @throws InvalidLockError
 */
export function decodeData(table: CharsetTable, encoded: string, lock: number): string {
  assertLock(lock)

  const { codeWidth } = table

  if (encoded.length % codeWidth !== 0) {
    throw new MalformedLengthError(encoded.length, codeWidth)
  }

  let decoded = ""

  for (let offset = 0; offset < encoded.length; offset += codeWidth) {
    const group = encoded.slice(offset, offset + codeWidth)

    if (!DIGIT_GROUP.test(group)) {
      throw new MalformedDigitsError(group, offset / codeWidth)
    }

    decoded += table.lookupChar(Number(group) - lock)
  }

  return decoded
}

/** Re-locks encoded text: decodes under `fromLock` and encodes the result under `toLock`. */
export function convertData(
  table: CharsetTable,
  encoded: string,
  fromLock: number,
  toLock: number,
): string {
  assertLock(toLock)
  return encodeData(table, decodeData(table, encoded, fromLock), toLock)
}

/** Number of characters (code points) in `text`. */
export function countChars(text: string): number {
  return [...text].length
}
