import { BaseError } from "@featurekit/errors"

export type TaskGraphErrorCode = "pool_closed"

export class TaskGraphError extends BaseError<TaskGraphErrorCode> {
  static poolClosed(): TaskGraphError {
    return new TaskGraphError("Worker pool is closed", {
      code: "pool_closed",
      isOperational: false,
    })
  }
}
