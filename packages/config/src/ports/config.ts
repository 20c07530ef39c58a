/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The shape of the configuration object, inferred from the schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ DEFAULT_LOCK: z.optional(z.coerce.number()) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("DEFAULT_LOCK")      // 3
 * config.explain("DEFAULT_LOCK")  // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for a key,
   * or "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Useful for spotting typos and stale settings.
   */
  extras(): string[]
}
