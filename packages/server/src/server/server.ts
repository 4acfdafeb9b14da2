import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import { ServerError } from "./server-errors"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  startup: StartupFn
  shutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

export const defaultCollaborators: ServerCollaborators = {
  startup,
  shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createRouter(): Router {
  return new Hono()
}

export class Server {
  private state: ServerState = "idle"
  private ready = false
  private app?: Application
  private handle?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {}

  /**
   * The fully wired application, built once. Does not run hooks or bind a port,
   * so tests can drive it through `app.request()`.
   */
  build(): Application {
    this.app ??= this.collabs.buildApp({
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(
        this.options.errorHandling,
        this.deps.logger,
      ),
      defaultMiddleware: this.collabs.createDefaultMiddleware(
        this.options,
        this.deps.logger,
      ),
    })

    return this.app
  }

  setupProcessHandlers(): this {
    this.signalHandler ??= this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.stop(),
    })

    return this
  }

  /** Runs the start hooks, then binds. Rejects if a hook fails or the deadline passes. */
  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") throw ServerError.alreadyStarted()

    this.state = "starting"

    try {
      const started = await this.collabs.startup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) throw ServerError.startupFailed(started.failures, started.timedOut)

      const listening = await this.collabs.listen(
        this.build(),
        this.options,
        this.deps.logger,
      )

      this.handle = this.collabs.createStopper({
        listening,
        clock: this.deps.clock,
        logger: this.deps.logger,
        shutdownTimeoutMs: this.options.shutdownTimeoutMs,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.shutdown,
        setReady: (ready) => {
          this.ready = ready
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.ready = true
      this.state = "started"

      return this.handle
    } catch (err) {
      this.state = "idle"
      this.ready = false
      throw err
    }
  }

  stop(): Promise<StopResult> {
    if (this.handle) return this.handle.stop()

    this.deps.logger.warn("Stop called but server not running")
    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
