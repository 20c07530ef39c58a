import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readOptionalFile } from "../read-optional-file"

export type DotenvSourceOptions = FileSourceOptions & {
  /** Same as EnvSource: keep only prefixed keys and strip the prefix. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readOptionalFile(this.opts)
    if (content === undefined) return {}

    const parsed = parse(content)
    const prefix = this.opts.prefix
    if (!prefix) return parsed

    return Object.fromEntries(
      Object.entries(parsed)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
