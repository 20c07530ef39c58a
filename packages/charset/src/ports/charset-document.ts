import { z } from "zod/mini"

/**
 * On-disk charset format.
 *
 * ```json
 * { "author": "ops", "timestamp": 1735689600, "mapping": { "a": 0, "b": 1 } }
 * ```
 *
 * Mapped values are raw; loaders add an offset (100 by default) so every code
 * has the same number of digits.
 */
export const charsetDocumentSchema = z.object({
  mapping: z.record(z.string(), z.int().check(z.minimum(0))),
  author: z.optional(z.string()),
  timestamp: z.optional(z.number()),
  codeWidth: z.optional(z.int().check(z.minimum(1))),
})

export type CharsetDocument = z.infer<typeof charsetDocumentSchema>
