import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Prefer `nowMs()` for arithmetic.
   */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /** Resolves after `ms`, or early when `signal` aborts. Never rejects. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
