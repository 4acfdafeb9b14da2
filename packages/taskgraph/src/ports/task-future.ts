export type TaskStatus = "pending" | "running" | "finished" | "error"

export type TaskOutcome<T> =
  | { readonly kind: "succeeded"; readonly value: T }
  | { readonly kind: "failed"; readonly error: unknown }

/**
 * Handle to a task submitted to a {@link WorkerPool}.
 *
 * `key` is assigned at submission and is the correlation token callers
 * persist before the task has started.
 */
export interface TaskFuture<T> {
  readonly key: string
  readonly status: TaskStatus

  /** Resolves with the task's value or rejects with its error. */
  result(): Promise<T>

  /** Settles with the outcome and never rejects. */
  outcome(): Promise<TaskOutcome<T>>
}
