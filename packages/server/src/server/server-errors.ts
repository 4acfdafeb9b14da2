import { BaseError } from "@featurekit/errors"
import type { HookFailure } from "../lifecycle/lifecycle-hook"

export type ServerErrorCode = "server_already_started" | "server_startup_failed"

export class ServerError extends BaseError<ServerErrorCode> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", {
      code: "server_already_started",
      isOperational: false,
    })
  }

  static startupFailed(failures: HookFailure[], timedOut: boolean): ServerError {
    const hooks = failures.map((f) => f.hook)

    return new ServerError(
      timedOut ? "Server startup timed out" : `Startup hooks failed: ${hooks.join(", ")}`,
      {
        code: "server_startup_failed",
        context: { hooks, timedOut },
        ...(failures[0] !== undefined && { cause: failures[0].error }),
      },
    )
  }
}
