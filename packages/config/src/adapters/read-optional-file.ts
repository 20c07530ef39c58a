import fs from "node:fs/promises"
import path from "node:path"

export type FileSourceOptions = {
  /**
   * Path to the file. Absolute, or relative to `cwd`.
   *
   * @example ".env", "digilock.json", "./config/digilock.json"
   */
  file: string

  /**
   * `true`: throw when the file does not exist.
   * `false`: treat a missing file as empty.
   */
  required: boolean

  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/** Returns the file's text, or `undefined` when it is missing and not required. */
export async function readOptionalFile(opts: FileSourceOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isMissingFile(err)) {
      return undefined
    }
    throw err
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
