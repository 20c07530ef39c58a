import {
  type CharsetTable,
  loadCharsetDirectory,
  loadCharsetFile,
  loadDefaultCharset,
} from "@digilock/charset"
import { createPinoLogger, type Logger } from "@digilock/logger"
import { createLockCodec } from "../core/lock-codec"
import type { LockCodec } from "../ports/lock-codec"
import type { CodecConfig } from "./schema"

export type CodecFromConfigDeps = {
  /** Replaces the pino logger built from `config.logging`. */
  logger?: Logger
}

/** Charset from `file`, else `dir`, else the bundled default. */
export function loadConfiguredCharset(
  charset: CodecConfig["charset"],
  logger: Logger,
): Promise<CharsetTable> {
  const opts = { offset: charset.offset, logger }

  if (charset.file !== undefined) return loadCharsetFile(charset.file, opts)
  if (charset.dir !== undefined) return loadCharsetDirectory(charset.dir, opts)
  return loadDefaultCharset(opts)
}

export async function createCodecFromConfig(
  config: CodecConfig,
  deps: CodecFromConfigDeps = {},
): Promise<LockCodec> {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName, module: "codec" },
    )

  const table = await loadConfiguredCharset(config.charset, logger)

  return createLockCodec({
    charset: table,
    logger,
    ...(config.defaultLock !== undefined && { defaultLock: config.defaultLock }),
  })
}
