import { EmptyLockSequenceError, InvalidLockError } from "./errors"

export function assertLock(lock: number): void {
  if (!Number.isSafeInteger(lock)) throw new InvalidLockError(lock)
}

export function assertLockSequence(locks: readonly number[]): void {
  if (locks.length === 0) throw new EmptyLockSequenceError()
  for (const lock of locks) assertLock(lock)
}
