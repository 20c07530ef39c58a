/**
 * A source of raw configuration values.
 *
 * Sources only *load*; validation and coercion happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "dotenv:.env", "json:digilock.json"
   */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
