import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Keep off in production,
   * where log processors expect one JSON object per line.
   */
  prettify?: boolean
}
