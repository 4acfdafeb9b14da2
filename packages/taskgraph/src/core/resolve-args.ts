import type { Deferred, DeferredArgs } from "../ports/worker-pool"
import { isTaskFuture } from "./task-handle"

/**
 * Replaces a future, or futures inside an array argument, with the values
 * they resolve to. Rejects with a failed dependency's error.
 */
export function resolveArg<T>(arg: Deferred<T>): Promise<T>
export async function resolveArg(arg: unknown): Promise<unknown> {
  if (isTaskFuture(arg)) return arg.result()

  if (Array.isArray(arg) && arg.some(isTaskFuture)) {
    return Promise.all(
      arg.map((item: unknown) => (isTaskFuture(item) ? item.result() : item)),
    )
  }

  return arg
}

export function resolveArgs<P extends unknown[]>(args: DeferredArgs<P>): Promise<P>
export async function resolveArgs(args: readonly unknown[]): Promise<unknown[]> {
  return Promise.all(args.map((arg) => resolveArg(arg)))
}
