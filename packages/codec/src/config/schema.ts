import { type LogLevelName, logLevelNames } from "@digilock/logger"
import { z } from "zod/mini"

export const ENV_PREFIX = "DIGILOCK_"

const safeInt = z.coerce
  .number()
  .check(z.refine((n: number) => Number.isSafeInteger(n), "Expected a safe integer"))

// `DIGILOCK_DEFAULT_LOCK=` in a .env file counts as not set.
const blankAsUnset = z.transform((v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v,
)

// JSON files give real booleans, env and dotenv give strings.
const flag = z.union([z.boolean(), z.stringbool()])

/** Settings keys as they appear after the `DIGILOCK_` prefix is stripped. */
export const codecEnvSchema = z.object({
  CHARSET_FILE: z.optional(z.string()),
  CHARSET_DIR: z.optional(z.string()),
  CHARSET_OFFSET: z.pipe(blankAsUnset, z._default(safeInt, 100)),

  DEFAULT_LOCK: z.pipe(blankAsUnset, z.optional(safeInt)),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(flag, false),
  SERVICE_NAME: z._default(z.string(), "digilock"),
})

export type CodecEnv = z.infer<typeof codecEnvSchema>

export type CodecConfig = {
  charset: {
    /** Absolute path of a single charset document. Wins over `dir`. */
    file?: string

    /** Absolute path of a directory of charset documents. */
    dir?: string

    /** Added to every value read from a charset document. */
    offset: number
  }

  defaultLock?: number

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
