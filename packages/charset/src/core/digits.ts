export const DECIMAL_DIGITS = ["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"] as const

/** Number of decimal digits needed to print a non-negative integer. */
export function digitWidth(n: number): number {
  return String(n).length
}

/** Largest value that fits in `width` decimal digits. */
export function maxForWidth(width: number): number {
  return 10 ** width - 1
}
