export type LogContext = {
  requestId: string
  principal: string

  method: string
  path: string

  service: string
  module: string
  env: string

  featuresetId: number
  taskId: string
}

export type LogOutcome = {
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
