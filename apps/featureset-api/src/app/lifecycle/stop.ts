import type { LifecycleHook } from "@featurekit/server"
import type { AppContext } from "../create-context"

/** Runs in order: in-flight featurizations settle before the stores they write to go away. */
export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { featuresets, notifications } = context.services.domains

  return [
    {
      name: "stop:featurization:pool",
      fn: async () => {
        await featuresets.pool.close()
      },
    },
    {
      name: "stop:featurization:watchers",
      fn: async () => {
        await featuresets.watcher.drain()
      },
    },
    {
      name: "stop:notifications",
      fn: async () => {
        notifications.hub.close()
      },
    },
    {
      name: "stop:redis",
      fn: async () => {
        if (context.infra.redisClient.isOpen) await context.infra.redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
