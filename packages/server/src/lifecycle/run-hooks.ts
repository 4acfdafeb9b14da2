import type { Clock, UnixMs } from "@featurekit/clock"
import type { Logger } from "@featurekit/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook. */
  failFast?: boolean
}

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks one at a time, in order, against a shared deadline.
 * Each hook receives a signal that aborts when the deadline passes.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<{ failures: HookFailure[]; timedOut: boolean }> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const remaining = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
  const meta = { phase: ctx.phase, hook: hook.name }

  if (remaining === 0) {
    ctx.logger.warn("Deadline reached, skipping remaining hooks", meta)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)

  const pastDeadline = () =>
    controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })

    if (pastDeadline()) {
      ctx.logger.warn("Hook finished after the deadline", meta)
      return { timedOut: true }
    }

    ctx.logger.info("Hook completed", meta)
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error("Hook failed", { ...meta, err })

    return { failure: { hook: hook.name, error: err }, timedOut: pastDeadline() }
  } finally {
    clearTimeout(timer)
  }
}
