import type { CharsetProvider } from "../ports/charset-provider"
import { DECIMAL_DIGITS, digitWidth } from "./digits"
import { InvalidCharsetError, UnknownCharacterError, UnknownCodeError } from "./errors"

export type CharsetMapping = ReadonlyMap<string, number> | Readonly<Record<string, number>>

export type CharsetTableInit = {
  mapping: CharsetMapping

  /**
   * Digits per code. Derived from the largest code when omitted.
   * Must be at least the width of the largest code.
   */
  codeWidth?: number

  author?: string

  /** Seconds since the epoch, as written in charset documents. */
  timestamp?: number
}

function isMap(mapping: CharsetMapping): mapping is ReadonlyMap<string, number> {
  return mapping instanceof Map
}

export function mappingEntries(mapping: CharsetMapping): [string, number][] {
  return isMap(mapping) ? [...mapping.entries()] : Object.entries(mapping)
}

function isSingleCodePoint(char: string): boolean {
  return [...char].length === 1
}

/**
 * Immutable bijection between single characters (Unicode code points) and
 * non-negative integer codes of a fixed decimal width.
 *
 * Tables are validated when created; a table that exists is always a
 * well-formed bijection.
 */
export class CharsetTable implements CharsetProvider {
  readonly codeWidth: number
  readonly maxCode: number
  readonly author: string
  readonly timestamp: number | undefined

  /** `true` when `0`-`9` are all mapped, which layered (multi-lock) encoding needs. */
  readonly coversDigits: boolean

  private readonly byChar: ReadonlyMap<string, number>
  private readonly byCode: ReadonlyMap<number, string>

  private constructor(
    byChar: Map<string, number>,
    byCode: Map<number, string>,
    codeWidth: number,
    maxCode: number,
    init: CharsetTableInit,
  ) {
    this.byChar = byChar
    this.byCode = byCode
    this.codeWidth = codeWidth
    this.maxCode = maxCode
    this.author = init.author ?? "unknown"
    this.timestamp = init.timestamp
    this.coversDigits = DECIMAL_DIGITS.every((d) => byChar.has(d))

    Object.freeze(this)
  }

  static create(init: CharsetTableInit): CharsetTable {
    const entries = mappingEntries(init.mapping)

    if (entries.length === 0) {
      throw new InvalidCharsetError("mapping is empty")
    }

    const byChar = new Map<string, number>()
    const byCode = new Map<number, string>()
    let maxCode = 0

    for (const [char, code] of entries) {
      if (!isSingleCodePoint(char)) {
        throw new InvalidCharsetError("keys must be exactly one character", { char })
      }
      if (!Number.isSafeInteger(code) || code < 0) {
        throw new InvalidCharsetError("codes must be non-negative integers", { char, code })
      }

      const existing = byCode.get(code)
      if (existing !== undefined) {
        throw new InvalidCharsetError("two characters share a code", {
          code,
          chars: [existing, char],
        })
      }

      byChar.set(char, code)
      byCode.set(code, char)
      maxCode = Math.max(maxCode, code)
    }

    const minWidth = digitWidth(maxCode)
    const codeWidth = init.codeWidth ?? minWidth

    if (!Number.isSafeInteger(codeWidth) || codeWidth < minWidth) {
      throw new InvalidCharsetError(`codeWidth must be an integer of at least ${minWidth}`, {
        codeWidth,
        maxCode,
      })
    }

    return new CharsetTable(byChar, byCode, codeWidth, maxCode, init)
  }

  get size(): number {
    return this.byChar.size
  }

  current(): CharsetTable {
    return this
  }

  hasChar(char: string): boolean {
    return this.byChar.has(char)
  }

  hasCode(code: number): boolean {
    return this.byCode.has(code)
  }

  /** @throws UnknownCharacterError */
  lookupCode(char: string): number {
    const code = this.byChar.get(char)
    if (code === undefined) throw new UnknownCharacterError(char)
    return code
  }

  /** @throws UnknownCodeError */
  lookupChar(code: number): string {
    const char = this.byCode.get(code)
    if (char === undefined) throw new UnknownCodeError(code)
    return char
  }

  /** Characters in code order. */
  chars(): string[] {
    return this.entries().map(([char]) => char)
  }

  /** `[char, code]` pairs in code order. */
  entries(): [string, number][] {
    return [...this.byChar.entries()].sort((a, b) => a[1] - b[1])
  }

  toMapping(): Record<string, number> {
    return Object.fromEntries(this.entries())
  }
}
