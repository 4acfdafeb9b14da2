import type { TaskFuture } from "./task-future"

export type TaskFn<P extends unknown[], R> = (...args: P) => R | Promise<R>

/**
 * A value, a future of it, or for array parameters an array whose elements
 * may each be futures.
 */
export type Deferred<T> =
  | T
  | TaskFuture<T>
  | (T extends readonly (infer E)[] ? readonly (E | TaskFuture<E>)[] : never)

export type DeferredArgs<P extends unknown[]> = { [K in keyof P]: Deferred<P[K]> }

export interface WorkerPool {
  /**
   * Schedules `fn` once every future among `args` has resolved. If any of
   * them fails, the task fails with that error without running.
   * Returns immediately.
   */
  submit<P extends unknown[], R>(fn: TaskFn<P, R>, ...args: DeferredArgs<P>): TaskFuture<R>

  /**
   * One task per item, in item order. `extra` is passed to every call after
   * the item.
   */
  map<I, E extends unknown[], R>(
    fn: (item: I, ...extra: E) => R | Promise<R>,
    items: readonly Deferred<I>[],
    ...extra: DeferredArgs<E>
  ): TaskFuture<R>[]

  /** Rejects new work and waits for submitted tasks to settle. */
  close(): Promise<void>
}
