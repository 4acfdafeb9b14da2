/**
 * Loads raw configuration values. No validation, coercion or merging happens here.
 * Sources are applied in order and later ones win.
 */
export interface ConfigSource {
  /** e.g. "env", "dotenv:.env.test" */
  readonly name: string

  /** An `undefined` value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
