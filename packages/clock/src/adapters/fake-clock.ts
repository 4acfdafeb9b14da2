import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep` resolves on the next microtask and moves time forward by the slept amount,
 * so code that sleeps between steps observes time passing without real timers.
 */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(at: UnixMs | Date): void {
    this.time = at instanceof Date ? at.getTime() : at
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || ms <= 0) return

    this.time += ms
  }
}
