import type { Clock, UnixMs } from "@featurekit/clock"
import type { Logger } from "@featurekit/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

/**
 * `timedOut` means the deadline passed before every hook ran.
 * Open sockets are not tracked or destroyed.
 */
export type StopResult = PhaseResult

/**
 * Stops accepting connections first, then runs the stop hooks.
 * Every hook runs even when an earlier one fails.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
  )

  const result = { ok: failures.length === 0 && !timedOut, failures, timedOut }

  ctx.logger.info("Shutdown complete", {
    ok: result.ok,
    failures: failures.length,
    timedOut,
  })

  return result
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) => closeUntilAborted(server, signal),
  }
}

/**
 * Resolves when the server has closed or the signal aborts, whichever comes first.
 */
function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => resolve()

    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)

      if (err) reject(err)
      else resolve()
    })
  })
}
