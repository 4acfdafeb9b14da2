import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean

  /**
   * Maximum depth of `cause` links followed.
   * @default 10
   */
  maxCauseDepth?: number
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - AppErrors keep their code, context and operational flag
 * - plain Errors get code "unknown" and are treated as non-operational
 * - anything else is wrapped as "NonErrorThrown" with the value in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(
  err: unknown,
  options: SerializeOptions,
  depth: number,
): SerializedError {
  const includeStack = options.includeStack ?? false
  const canFollowCause = depth < (options.maxCauseDepth ?? 10)

  if (err instanceof Error) {
    const app = isAppError(err) ? err : undefined
    const cause = canFollowCause && err.cause !== undefined
      ? serializeAt(err.cause, options, depth + 1)
      : undefined

    return {
      name: err.name,
      code: app?.code ?? "unknown",
      message: err.message,
      context: app ? { ...app.context } : {},
      isOperational: app?.isOperational ?? false,
      timestamp: (app?.timestamp ?? new Date()).toISOString(),
      ...(cause !== undefined && { cause }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
