import type { Milliseconds } from "@featurekit/clock"
import { NullLogger } from "@featurekit/logger"
import type { Application, LifecycleHook, LifecycleHookContext } from "@featurekit/server"
import { type AppContext, type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "../server"

export type TestHarnessLifecycle = {
  /** Runs the start hooks without binding a port. */
  start: () => Promise<void>

  /** Runs the stop hooks: drains featurizations and closes the hub. */
  stop: () => Promise<void>
}

export type TestHarness = {
  /** Fully wired app, driven through `app.request()`. */
  app: Application
  ctx: AppContext
  lifecycle: TestHarnessLifecycle
}

const HOOK_BUDGET_MS: Milliseconds = 30_000

/** In-memory store and storage, silent logs, and no `.env` file. */
export async function createTestHarness(options: AppContextOptions = {}): Promise<TestHarness> {
  const ctx = await createAppContext({
    env: { NODE_ENV: "test" },
    configOverrides: { store: { driver: "memory" }, storage: { driver: "memory" } },
    coreOverrides: { logger: new NullLogger() },
    ...options,
  })
  const { server } = buildServer(ctx)

  return {
    app: server.build(),
    ctx,
    lifecycle: {
      start: () => runHooks(ctx.createStartHooks(ctx)),
      stop: () => runHooks(ctx.createStopHooks(ctx)),
    },
  }
}

async function runHooks(hooks: readonly LifecycleHook[]): Promise<void> {
  const controller = new AbortController()
  const deadline = Date.now() + HOOK_BUDGET_MS

  for (const hook of hooks) {
    const hookCtx: LifecycleHookContext = {
      signal: controller.signal,
      timeRemainingMs: Math.max(0, deadline - Date.now()),
    }

    await hook.fn(hookCtx)
  }
}
