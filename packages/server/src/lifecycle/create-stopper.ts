import type { Clock } from "@featurekit/clock"
import type { Logger } from "@featurekit/logger"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Listening } from "./listen"
import type { ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  /** Idempotent; later calls return the first stop's result. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  listening: Listening
  clock: Clock
  logger: Logger
  shutdownTimeoutMs: number
  stopHooks: LifecycleHook[]
  shutdown: ShutdownFn

  /** Called synchronously before any hook runs. */
  setReady: (ready: boolean) => void
  /** Called once shutdown settles. */
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)
      return stopping
    },
    address: ctx.listening.address,
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.listening.server,
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.clock.nowMs() + ctx.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
