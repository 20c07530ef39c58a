import type { CharsetTable } from "../core/charset-table"

/**
 * Hands out the charset table a codec call should use.
 *
 * Callers take one snapshot per operation and use it throughout, so a
 * provider that swaps tables never exposes a half-old, half-new mapping.
 */
export interface CharsetProvider {
  /** @throws TableNotInitializedError when no table is available yet */
  current(): CharsetTable
}
