import {
  type CharsetMapping,
  CharsetTable,
  type CharsetTableInit,
  mappingEntries,
} from "./charset-table"

export type CharsetBuilderOptions = {
  /** Code given to the first character added to an empty builder. @default 100 */
  firstCode?: number
}

type MergeSource = CharsetTable | CharsetBuilder | CharsetMapping

/**
 * Mutable staging area for assembling a charset before freezing it into a
 * {@link CharsetTable}. Nothing is validated until {@link build}.
 *
 * @example
 * ```ts
 * const table = new CharsetBuilder()
 *   .add("a") // 100
 *   .add("b") // 101
 *   .merge(loadedTable)
 *   .build({ author: "ops" })
 * ```
 */
export class CharsetBuilder {
  private readonly mapping = new Map<string, number>()
  private readonly firstCode: number

  // Largest staged code; recomputed only after the current maximum is lowered or removed.
  private maxCode: number | undefined
  private maxStale = false

  constructor(opts: CharsetBuilderOptions = {}) {
    this.firstCode = opts.firstCode ?? 100
  }

  static from(table: CharsetTable, opts?: CharsetBuilderOptions): CharsetBuilder {
    return new CharsetBuilder(opts).merge(table)
  }

  get size(): number {
    return this.mapping.size
  }

  has(char: string): boolean {
    return this.mapping.has(char)
  }

  /**
   * Maps `char` to one above the current largest code (or `firstCode` when empty).
   * No-op for a character that is already mapped.
   */
  add(char: string): this {
    if (this.mapping.has(char)) return this

    const max = this.largestCode()
    return this.set(char, max === undefined ? this.firstCode : max + 1)
  }

  set(char: string, code: number): this {
    const previous = this.mapping.get(char)
    this.mapping.set(char, code)

    if (previous !== undefined && previous === this.maxCode && code < previous) {
      this.maxStale = true
    } else if (!this.maxStale && (this.maxCode === undefined || code > this.maxCode)) {
      this.maxCode = code
    }
    return this
  }

  /** @returns `true` if the character was mapped */
  remove(char: string): boolean {
    const code = this.mapping.get(char)
    if (code === undefined) return false

    this.mapping.delete(char)
    if (code === this.maxCode) this.maxStale = true
    return true
  }

  /** Copies characters from each source in turn; characters already present keep their code. */
  merge(...sources: MergeSource[]): this {
    for (const source of sources) {
      for (const [char, code] of entriesOf(source)) {
        if (!this.mapping.has(char)) this.set(char, code)
      }
    }
    return this
  }

  toMapping(): Record<string, number> {
    return Object.fromEntries(this.mapping)
  }

  private largestCode(): number | undefined {
    if (this.maxStale) {
      let max: number | undefined
      for (const code of this.mapping.values()) {
        if (max === undefined || code > max) max = code
      }
      this.maxCode = max
      this.maxStale = false
    }
    return this.maxCode
  }

  /** @throws InvalidCharsetError when the staged mapping is not a valid table */
  build(meta: Omit<CharsetTableInit, "mapping"> = {}): CharsetTable {
    return CharsetTable.create({ ...meta, mapping: new Map(this.mapping) })
  }
}

function entriesOf(source: MergeSource): [string, number][] {
  if (source instanceof CharsetTable) return source.entries()
  if (source instanceof CharsetBuilder) return Object.entries(source.toMapping())
  return mappingEntries(source)
}
