import { ConfigSourceError } from "../../core/errors"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readOptionalFile } from "../read-optional-file"

export type JsonSourceOptions = FileSourceOptions

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readOptionalFile(this.opts)
    if (content === undefined) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigSourceError(`${this.name} is not valid JSON`, this.name, { cause: err })
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new ConfigSourceError(`${this.name} must contain a JSON object`, this.name)
    }

    return Object.fromEntries(Object.entries(parsed))
  }
}
