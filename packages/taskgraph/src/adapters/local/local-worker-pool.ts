import { type IdGenerator, uuidV4 } from "@featurekit/id"
import type { Logger } from "@featurekit/logger"
import { TaskGraphError } from "../../core/errors"
import { resolveArg, resolveArgs } from "../../core/resolve-args"
import { TaskHandle } from "../../core/task-handle"
import type { TaskFuture } from "../../ports/task-future"
import type { Deferred, DeferredArgs, TaskFn, WorkerPool } from "../../ports/worker-pool"

export type LocalWorkerPoolDeps = {
  logger: Logger

  /** @default uuidV4 */
  ids?: IdGenerator
}

export type LocalWorkerPoolOptions = {
  /** Tasks executing at once. Tasks waiting on dependencies do not hold a slot. */
  concurrency: number
}

/**
 * Runs tasks as promises on the current event loop.
 *
 * Task keys are `<function name>-<id>`, or `task-<id>` for anonymous functions.
 */
export class LocalWorkerPool implements WorkerPool {
  private closed = false
  private running = 0

  private readonly waiting: (() => void)[] = []
  private readonly inFlight = new Set<Promise<void>>()
  private readonly ids: IdGenerator

  constructor(
    private readonly deps: LocalWorkerPoolDeps,
    private readonly opts: LocalWorkerPoolOptions,
  ) {
    if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${opts.concurrency}`)
    }

    this.ids = deps.ids ?? uuidV4
  }

  submit<P extends unknown[], R>(fn: TaskFn<P, R>, ...args: DeferredArgs<P>): TaskFuture<R> {
    return this.schedule(
      fn.name,
      () => resolveArgs<P>(args),
      (resolved) => fn(...resolved),
    )
  }

  map<I, E extends unknown[], R>(
    fn: (item: I, ...extra: E) => R | Promise<R>,
    items: readonly Deferred<I>[],
    ...extra: DeferredArgs<E>
  ): TaskFuture<R>[] {
    return items.map((item) =>
      this.schedule(
        fn.name,
        () => Promise.all([resolveArg<I>(item), resolveArgs<E>(extra)]),
        ([value, rest]) => fn(value, ...rest),
      ),
    )
  }

  async close(): Promise<void> {
    this.closed = true

    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight)
    }
  }

  get stats(): { running: number; waiting: number; inFlight: number } {
    return { running: this.running, waiting: this.waiting.length, inFlight: this.inFlight.size }
  }

  private schedule<A, R>(
    name: string,
    prepare: () => Promise<A>,
    run: (prepared: A) => R | Promise<R>,
  ): TaskFuture<R> {
    if (this.closed) throw TaskGraphError.poolClosed()

    const task = new TaskHandle<R>(`${name || "task"}-${this.ids.generate()}`)
    const execution = this.execute(task, prepare, run)

    this.inFlight.add(execution)
    void execution.finally(() => this.inFlight.delete(execution))

    return task
  }

  private async execute<A, R>(
    task: TaskHandle<R>,
    prepare: () => Promise<A>,
    run: (prepared: A) => R | Promise<R>,
  ): Promise<void> {
    let prepared: A

    try {
      prepared = await prepare()
    } catch (err) {
      this.deps.logger.debug("Task dependency failed", { taskId: task.key, err })
      task.fail(err)
      return
    }

    await this.acquire()
    task.markRunning()

    try {
      task.succeed(await run(prepared))
    } catch (err) {
      this.deps.logger.debug("Task failed", { taskId: task.key, err })
      task.fail(err)
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.opts.concurrency) {
      this.running++
      return Promise.resolve()
    }

    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.running++
        resolve()
      })
    })
  }

  private release(): void {
    this.running--
    this.waiting.shift()?.()
  }
}
