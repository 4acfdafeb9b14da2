import type { LifecycleHook } from "@featurekit/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  if (context.config.store.driver !== "redis") return []

  return [
    {
      name: "start:redis",
      fn: async () => {
        await context.infra.redisClient.connect()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
