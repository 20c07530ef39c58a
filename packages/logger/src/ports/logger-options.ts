import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Events below this level are dropped. */
  level: LogLevelName

  /** Human-readable, colorized lines instead of JSON. For local runs only. */
  prettify?: boolean
}
