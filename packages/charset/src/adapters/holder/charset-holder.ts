import type { CharsetTable } from "../../core/charset-table"
import { TableNotInitializedError } from "../../core/errors"
import type { CharsetProvider } from "../../ports/charset-provider"

/**
 * Swappable reference to the active charset.
 *
 * `replace` is a single reference assignment; a caller that already took a
 * snapshot through `current()` keeps using that table to the end of its call.
 */
export class CharsetHolder implements CharsetProvider {
  private table: CharsetTable | undefined

  constructor(initial?: CharsetTable) {
    this.table = initial
  }

  get isLoaded(): boolean {
    return this.table !== undefined
  }

  current(): CharsetTable {
    if (this.table === undefined) throw new TableNotInitializedError()
    return this.table
  }

  /** @returns the table that was active before, if any */
  replace(next: CharsetTable): CharsetTable | undefined {
    const previous = this.table
    this.table = next
    return previous
  }
}
