import type { CharsetProvider, CharsetTable } from "@digilock/charset"
import { toAppError } from "@digilock/errors"
import { type Logger, type LogMeta, NullLogger } from "@digilock/logger"
import type { BatchItemResult } from "../ports/batch-item-result"
import type { CodecOperation, LockCodec } from "../ports/lock-codec"
import * as batch from "./batch-codec"
import { LockRequiredError } from "./errors"
import { assertLock } from "./lock"
import * as multi from "./multi-lock-codec"
import * as single from "./single-codec"

export type LockCodecDeps = {
  /** A {@link CharsetTable}, or a provider such as a `CharsetHolder` for hot reload. */
  charset: CharsetProvider
  logger?: Logger
  defaultLock?: number
}

export function createLockCodec(deps: LockCodecDeps): LockCodec {
  return new DefaultLockCodec(deps)
}

type Traced<T> = {
  result: T
  meta: LogMeta
}

class DefaultLockCodec implements LockCodec {
  readonly defaultLock: number | undefined
  private readonly charset: CharsetProvider
  private readonly logger: Logger

  constructor(deps: LockCodecDeps) {
    if (deps.defaultLock !== undefined) assertLock(deps.defaultLock)

    this.charset = deps.charset
    this.logger = deps.logger ?? new NullLogger()
    this.defaultLock = deps.defaultLock
  }

  encodeData(text: string, lock?: number): string {
    return this.run("encodeData", (table) => {
      const k = this.resolveLock(lock)
      const result = single.encodeData(table, text, k)
      const chars = single.countChars(text)
      return { result, meta: { lock: k, chars, groups: chars } }
    })
  }

  decodeData(encoded: string, lock?: number): string {
    return this.run("decodeData", (table) => {
      const k = this.resolveLock(lock)
      const result = single.decodeData(table, encoded, k)
      return {
        result,
        meta: {
          lock: k,
          chars: single.countChars(result),
          groups: encoded.length / table.codeWidth,
        },
      }
    })
  }

  convertData(encoded: string, fromLock: number, toLock: number): string {
    return this.run("convertData", (table) => {
      const result = single.convertData(table, encoded, fromLock, toLock)
      return {
        result,
        meta: { fromLock, toLock, groups: encoded.length / table.codeWidth },
      }
    })
  }

  encodeBatch(texts: readonly string[], lock?: number): string[] {
    return this.run("encodeBatch", (table) => {
      const k = this.resolveLock(lock)
      const result = batch.encodeBatch(table, texts, k)
      return { result, meta: { lock: k, items: texts.length } }
    })
  }

  decodeBatch(encoded: readonly string[], lock?: number): string[] {
    return this.run("decodeBatch", (table) => {
      const k = this.resolveLock(lock)
      const result = batch.decodeBatch(table, encoded, k)
      return { result, meta: { lock: k, items: encoded.length } }
    })
  }

  tryEncodeBatch(texts: readonly string[], lock?: number): BatchItemResult<string>[] {
    return this.run("tryEncodeBatch", (table) => {
      const k = this.resolveLock(lock)
      const result = batch.tryEncodeBatch(table, texts, k)
      return { result, meta: { lock: k, items: texts.length, failed: countFailed(result) } }
    })
  }

  tryDecodeBatch(encoded: readonly string[], lock?: number): BatchItemResult<string>[] {
    return this.run("tryDecodeBatch", (table) => {
      const k = this.resolveLock(lock)
      const result = batch.tryDecodeBatch(table, encoded, k)
      return { result, meta: { lock: k, items: encoded.length, failed: countFailed(result) } }
    })
  }

  mEncode(locks: readonly number[], text: string): string {
    return this.run("mEncode", (table) => {
      const result = multi.mEncode(table, locks, text)
      return {
        result,
        meta: {
          locks: [...locks],
          chars: single.countChars(text),
          groups: result.length / table.codeWidth,
        },
      }
    })
  }

  mDecode(locks: readonly number[], encoded: string): string {
    return this.run("mDecode", (table) => {
      const result = multi.mDecode(table, locks, encoded)
      return {
        result,
        meta: {
          locks: [...locks],
          chars: single.countChars(result),
          groups: encoded.length / table.codeWidth,
        },
      }
    })
  }

  private resolveLock(lock: number | undefined): number {
    const resolved = lock ?? this.defaultLock
    if (resolved === undefined) throw new LockRequiredError()
    return resolved
  }

  /**
   * Takes one charset snapshot for the whole call and emits exactly one log
   * event: `debug` on success, `warn` on failure. Errors are rethrown as is.
   */
  private run<T>(operation: CodecOperation, fn: (table: CharsetTable) => Traced<T>): T {
    let table: CharsetTable
    let traced: Traced<T>

    try {
      table = this.charset.current()
      traced = fn(table)
    } catch (err) {
      const appError = toAppError(err)
      this.logger.warn(`${operation} failed`, {
        operation,
        code: appError.code,
        category: appError.category,
        err,
      })
      throw err
    }

    this.logger.debug(`${operation} succeeded`, {
      operation,
      charset: table.author,
      ...traced.meta,
    })

    return traced.result
  }
}

function countFailed(results: BatchItemResult<unknown>[]): number {
  return results.filter((r) => !r.ok).length
}
