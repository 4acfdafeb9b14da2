import type { TaskFuture, TaskOutcome, TaskStatus } from "../ports/task-future"

export class TaskHandle<T> implements TaskFuture<T> {
  private state: TaskStatus = "pending"
  private settle: (outcome: TaskOutcome<T>) => void = () => {}
  private readonly settled: Promise<TaskOutcome<T>>

  constructor(readonly key: string) {
    this.settled = new Promise((resolve) => {
      this.settle = resolve
    })
  }

  get status(): TaskStatus {
    return this.state
  }

  async result(): Promise<T> {
    const outcome = await this.settled
    if (outcome.kind === "failed") throw outcome.error

    return outcome.value
  }

  outcome(): Promise<TaskOutcome<T>> {
    return this.settled
  }

  markRunning(): void {
    if (this.state === "pending") this.state = "running"
  }

  succeed(value: T): void {
    if (this.isDone()) return

    this.state = "finished"
    this.settle({ kind: "succeeded", value })
  }

  fail(error: unknown): void {
    if (this.isDone()) return

    this.state = "error"
    this.settle({ kind: "failed", error })
  }

  private isDone(): boolean {
    return this.state === "finished" || this.state === "error"
  }
}

export function isTaskFuture(value: unknown): value is TaskFuture<unknown> {
  return value instanceof TaskHandle
}
