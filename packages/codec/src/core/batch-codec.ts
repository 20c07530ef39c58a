import type { CharsetTable } from "@digilock/charset"
import { toAppError } from "@digilock/errors"
import type { BatchItemResult } from "../ports/batch-item-result"
import { BatchItemError } from "./errors"
import { assertLock } from "./lock"
import { decodeData, encodeData } from "./single-codec"

function failFast<T>(index: number, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    throw new BatchItemError(index, err)
  }
}

function collect<T>(index: number, fn: () => T): BatchItemResult<T> {
  try {
    return { ok: true, index, value: fn() }
  } catch (err) {
    return { ok: false, index, error: toAppError(err) }
  }
}

/**
 * Encodes each text under the same lock, preserving order and count.
 *
 * An invalid lock is rejected before any element is touched.
 *
 * @throws BatchItemError for the first element that fails, with that element's error as `cause`
 */
export function encodeBatch(table: CharsetTable, texts: readonly string[], lock: number): string[] {
  assertLock(lock)
  return texts.map((text, index) => failFast(index, () => encodeData(table, text, lock)))
}

/** @throws BatchItemError for the first element that fails */
export function decodeBatch(
  table: CharsetTable,
  encoded: readonly string[],
  lock: number,
): string[] {
  assertLock(lock)
  return encoded.map((item, index) => failFast(index, () => decodeData(table, item, lock)))
}

/** Like {@link encodeBatch}, but reports every element instead of stopping at the first failure. */
export function tryEncodeBatch(
  table: CharsetTable,
  texts: readonly string[],
  lock: number,
): BatchItemResult<string>[] {
  assertLock(lock)
  return texts.map((text, index) => collect(index, () => encodeData(table, text, lock)))
}

export function tryDecodeBatch(
  table: CharsetTable,
  encoded: readonly string[],
  lock: number,
): BatchItemResult<string>[] {
  assertLock(lock)
  return encoded.map((item, index) => collect(index, () => decodeData(table, item, lock)))
}
