import fs from "node:fs/promises"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { type Logger, NullLogger } from "@digilock/logger"
import { CharsetTable } from "../../core/charset-table"
import { CharsetLoadError, InvalidCharsetError } from "../../core/errors"
import { type CharsetDocument, charsetDocumentSchema } from "../../ports/charset-document"

export const DEFAULT_CODE_OFFSET = 100

export const DEFAULT_CHARSET_PATH = fileURLToPath(
  new URL("../../../resources/default-charset.json", import.meta.url),
)

export type CharsetLoadOptions = {
  /** Added to every mapped value. @default 100 */
  offset?: number

  /** Timestamp (seconds) for documents that carry none. */
  now?: () => number

  logger?: Logger
}

/**
 * Validate an already-parsed charset document and build its table.
 *
 * @param source - label used in errors, e.g. a file name
 * @throws CharsetLoadError
 */
export function parseCharsetDocument(
  input: unknown,
  opts: CharsetLoadOptions = {},
  source = "inline",
): CharsetTable {
  return buildTable([validateDocument(input, source)], opts, source)
}

export async function loadCharsetFile(
  file: string,
  opts: CharsetLoadOptions = {},
): Promise<CharsetTable> {
  const doc = await readDocument(file)
  const table = buildTable([doc], opts, file)

  logLoaded(opts.logger, file, table)
  return table
}

/**
 * Loads every `*.json` file below `dir` in sorted path order and merges them
 * into one table. A character defined in several files takes the code from the
 * last one.
 */
export async function loadCharsetDirectory(
  dir: string,
  opts: CharsetLoadOptions = {},
): Promise<CharsetTable> {
  let names: string[]
  try {
    names = await fs.readdir(dir, { recursive: true })
  } catch (err) {
    throw new CharsetLoadError(`Cannot read charset directory ${dir}`, dir, { cause: err })
  }

  const files = names
    .filter((name) => name.endsWith(".json"))
    .sort()
    .map((name) => path.join(dir, name))

  if (files.length === 0) {
    throw new CharsetLoadError(`No charset files found in ${dir}`, dir)
  }

  const docs: CharsetDocument[] = []
  for (const file of files) {
    docs.push(await readDocument(file))
  }

  const table = buildTable(docs, opts, dir)

  logLoaded(opts.logger, dir, table, { files: files.length })
  return table
}

export function loadDefaultCharset(opts: CharsetLoadOptions = {}): Promise<CharsetTable> {
  return loadCharsetFile(DEFAULT_CHARSET_PATH, opts)
}

async function readDocument(file: string): Promise<CharsetDocument> {
  let text: string
  try {
    text = await fs.readFile(file, "utf-8")
  } catch (err) {
    throw new CharsetLoadError(`Cannot read charset file ${file}`, file, { cause: err })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new CharsetLoadError(`Charset file ${file} is not valid JSON`, file, { cause: err })
  }

  return validateDocument(parsed, file)
}

function validateDocument(input: unknown, source: string): CharsetDocument {
  const result = charsetDocumentSchema.safeParse(input)

  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.map(String).join("."),
      message: i.message,
    }))
    throw new CharsetLoadError(`${source} is not a valid charset document`, source, {
      context: { issues },
    })
  }

  if (Object.keys(result.data.mapping).length === 0) {
    throw new CharsetLoadError(`${source} has an empty mapping`, source)
  }

  return result.data
}

function buildTable(docs: CharsetDocument[], opts: CharsetLoadOptions, source: string): CharsetTable {
  const offset = opts.offset ?? DEFAULT_CODE_OFFSET
  const mapping = new Map<string, number>()
  let author: string | undefined
  let timestamp: number | undefined
  let codeWidth: number | undefined

  for (const doc of docs) {
    for (const [char, value] of Object.entries(doc.mapping)) {
      mapping.set(char, value + offset)
    }
    author = doc.author ?? author
    timestamp = doc.timestamp ?? timestamp
    if (doc.codeWidth !== undefined) codeWidth = Math.max(codeWidth ?? 0, doc.codeWidth)
  }

  try {
    return CharsetTable.create({
      mapping,
      author: author ?? "unknown",
      timestamp: timestamp ?? (opts.now ?? nowSeconds)(),
      ...(codeWidth !== undefined && { codeWidth }),
    })
  } catch (err) {
    if (err instanceof InvalidCharsetError) {
      throw new CharsetLoadError(`${source}: ${err.message}`, source, {
        cause: err,
        context: err.context,
      })
    }
    throw err
  }
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

function logLoaded(
  logger: Logger = new NullLogger(),
  source: string,
  table: CharsetTable,
  extra: Record<string, unknown> = {},
): void {
  logger.info("Charset loaded", {
    ...extra,
    source,
    charset: table.author,
    size: table.size,
    codeWidth: table.codeWidth,
  })
}
