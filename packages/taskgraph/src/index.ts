export {
  LocalWorkerPool,
  type LocalWorkerPoolDeps,
  type LocalWorkerPoolOptions,
} from "./adapters/local/local-worker-pool"
export { TaskGraphError, type TaskGraphErrorCode } from "./core/errors"
export { isTaskFuture, TaskHandle } from "./core/task-handle"
export type { TaskFuture, TaskOutcome, TaskStatus } from "./ports/task-future"
export type { Deferred, DeferredArgs, TaskFn, WorkerPool } from "./ports/worker-pool"
