export type LogContext = {
  service: string
  module: string
  env: string

  /** Codec operation being performed, e.g. "encodeData" or "mDecode". */
  operation: string

  /** Author / provenance of the charset in use. */
  charset: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
