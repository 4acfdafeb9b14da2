import type { TimeSource } from "@featurekit/clock"
import { describeError } from "@featurekit/errors"
import type { Logger } from "@featurekit/logger"
import type { ObjectRef, StoragePort } from "@featurekit/storage"
import type { TaskFuture } from "@featurekit/taskgraph"
import { FlowEvent, type NotificationEmitter } from "../../notifications"
import type { PendingFeatureset } from "../model/featureset.model"
import type { FeaturesetRepository } from "./featureset-repository"

export type FeaturizationWatcherDeps = {
  featuresets: FeaturesetRepository
  notifications: NotificationEmitter
  storage: StoragePort
  clock: TimeSource
  logger: Logger
}

export type WatchRequest = {
  future: TaskFuture<ObjectRef>
  record: PendingFeatureset

  /** Who receives the notifications. */
  principal: string
}

/** A submitted computation whose record could not be stored. */
export type AbandonRequest = {
  future: TaskFuture<ObjectRef>
  taskId: string
}

/**
 * Reconciles a featureset record with the outcome of its computation, once.
 *
 * On success the record is completed and the principal gets a note. On
 * failure the record is deleted and the principal gets an error note. A
 * refresh action follows either way.
 */
export class FeaturizationWatcher {
  private readonly inFlight = new Set<Promise<void>>()
  private readonly logger: Logger

  constructor(private readonly deps: FeaturizationWatcherDeps) {
    this.logger = deps.logger.child({ module: "featurization-watcher" })
  }

  /** Returns immediately; the watch runs detached from the caller. */
  watch(request: WatchRequest): void {
    this.track(this.reconcile(request))
  }

  /** Waits out the computation and removes whatever artifact it wrote. */
  abandon(request: AbandonRequest): void {
    this.track(this.cleanUp(request))
  }

  get pending(): number {
    return this.inFlight.size
  }

  /** Resolves once every watch started so far has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight)
    }
  }

  private track(work: Promise<void>): void {
    this.inFlight.add(work)
    void work.finally(() => this.inFlight.delete(work))
  }

  private async reconcile({ future, record, principal }: WatchRequest): Promise<void> {
    const outcome = await future.outcome()

    try {
      if (outcome.kind === "succeeded") {
        await this.complete(record, principal)
      } else {
        await this.discard(record, principal, outcome.error)
      }
    } catch (err) {
      this.logger.error("Could not reconcile featureset", {
        featuresetId: record.id,
        taskId: record.taskId,
        err,
      })
    } finally {
      this.deps.notifications.emit(principal, FlowEvent.fetchFeaturesets())
    }
  }

  private async complete(record: PendingFeatureset, principal: string): Promise<void> {
    const res = await this.deps.featuresets.markCompleted(record.id, this.deps.clock.now())

    if (res.kind !== "written") {
      this.logger.info("Featureset deleted before its computation finished", {
        featuresetId: record.id,
        taskId: record.taskId,
      })
      return
    }

    this.logger.info("Featureset completed", {
      featuresetId: record.id,
      taskId: record.taskId,
    })
    this.deps.notifications.emit(
      principal,
      FlowEvent.note(`Calculation of featureset '${res.record.name}' completed.`),
    )
  }

  private async discard(
    record: PendingFeatureset,
    principal: string,
    error: unknown,
  ): Promise<void> {
    await this.deps.featuresets.delete(record.id)

    this.logger.error("Featurization failed, featureset removed", {
      featuresetId: record.id,
      taskId: record.taskId,
      err: error,
    })
    this.deps.notifications.emit(
      principal,
      FlowEvent.error(`Cannot featurize ${record.name}: ${describeError(error)}`),
    )
  }

  private async cleanUp({ future, taskId }: AbandonRequest): Promise<void> {
    const outcome = await future.outcome()
    if (outcome.kind !== "succeeded") return

    try {
      await this.deps.storage.delete(outcome.value)
      this.logger.info("Removed artifact of an unrecorded featureset", { taskId })
    } catch (err) {
      this.logger.error("Could not remove artifact of an unrecorded featureset", {
        taskId,
        err,
      })
    }
  }
}
