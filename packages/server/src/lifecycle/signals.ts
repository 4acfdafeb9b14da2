import type { Logger } from "@featurekit/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop: () => Promise<StopResult>

  /**
   * Hard limit for the stop that follows a fatal error, after which the process exits.
   * @default 10_000
   */
  fatalTimeoutMs?: number
}

export interface SignalHandler {
  unregister: () => void
}

type Trigger =
  | { kind: "signal"; signal: NodeJS.Signals }
  | { kind: "fatal"; reason: "uncaughtException" | "unhandledRejection"; err: unknown }

/**
 * Routes SIGINT and SIGTERM to a graceful stop, and uncaught errors to a stop
 * followed by `process.exit(1)`. Only the first trigger starts a stop.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  let stopping = false

  const handle = (trigger: Trigger): void => {
    if (trigger.kind === "signal") {
      ctx.logger.info("Received signal", { signal: trigger.signal })
      if (stopping) return

      stopping = true
      void runStop(ctx, trigger.signal)
      return
    }

    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", {
        reason: trigger.reason,
        err: trigger.err,
      })
      process.exit(1)
      return
    }

    stopping = true
    void fatalStop(ctx, fatalTimeoutMs, trigger.reason, trigger.err)
  }

  const onSigint = () => handle({ kind: "signal", signal: "SIGINT" })
  const onSigterm = () => handle({ kind: "signal", signal: "SIGTERM" })
  const onUncaught = (err: Error) =>
    handle({ kind: "fatal", reason: "uncaughtException", err })
  const onRejection = (err: unknown) =>
    handle({ kind: "fatal", reason: "unhandledRejection", err })

  process.on("SIGINT", onSigint)
  process.on("SIGTERM", onSigterm)
  process.on("uncaughtException", onUncaught)
  process.on("unhandledRejection", onRejection)

  return {
    unregister: () => {
      process.off("SIGINT", onSigint)
      process.off("SIGTERM", onSigterm)
      process.off("uncaughtException", onUncaught)
      process.off("unhandledRejection", onRejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function fatalStop(
  ctx: SignalHandlerContext,
  timeoutMs: number,
  reason: string,
  err: unknown,
): Promise<void> {
  ctx.logger.fatal("Fatal error", { reason, err })

  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    process.exit(1)
  }, timeoutMs)
  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  process.exit(1)
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  ctx.logger.warn("Shutdown triggered", { reason })

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failures: result.failures.map((f) => f.hook),
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
