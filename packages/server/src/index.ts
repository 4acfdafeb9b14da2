export { createErrorHandler, type ErrorHandler } from "./errors/create-error-handler"
export type {
  ErrorMapping,
  ErrorMappingsConfig,
  ErrorResponse,
  ErrorResponseBody,
} from "./errors/error-formatter"
export {
  formatPath,
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors/validation"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createRouter,
  createServer,
  type Middleware,
  type RequestHandler,
  type Router,
  Server,
} from "./server/server"
export { ServerError, type ServerErrorCode } from "./server/server-errors"
export type {
  PathString,
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export { applyOverrides, type DeepPartial } from "./utils/apply-overrides"
