/**
 * Validated configuration plus provenance for each key.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z._default(z.coerce.number(), 4700) }),
 *   sources: [new DotenvSource({ file: ".env.local", required: false }), new EnvSource()],
 * })
 *
 * config.value.SERVER_PORT        // 4700
 * config.explain("SERVER_PORT")   // "default"
 * ```
 */
export interface IConfig<T extends object> {
  readonly value: T

  /** Name of the source that supplied `key`, or "default" when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys provided by sources that the schema does not declare. */
  unknownKeys(): string[]
}
