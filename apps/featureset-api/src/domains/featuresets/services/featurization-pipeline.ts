import type { Clock } from "@featurekit/clock"
import type { Logger } from "@featurekit/logger"
import type { ObjectRef, StoragePort } from "@featurekit/storage"
import type { TaskFuture, WorkerPool } from "@featurekit/taskgraph"
import type { DatasetFile } from "../../projects"
import { assembleFeatureset } from "../toolkit/assemble"
import { featurizeTimeSeries } from "../toolkit/featurize"
import { type ImputeOptions, imputeFeatureset } from "../toolkit/impute"
import { saveFeatureset } from "../toolkit/save"
import { extractLabel, loadTimeSeries } from "../toolkit/time-series"

export type FeaturizationPipelineDeps = {
  pool: WorkerPool
  storage: StoragePort
  clock: Clock
  logger: Logger
}

export type FeaturizationPipelineOptions = {
  impute: ImputeOptions
}

export type FeaturizationRequest = {
  files: readonly DatasetFile[]
  features: readonly string[]

  /** Where the artifact is written; chosen before anything runs. */
  artifact: ObjectRef
}

export type SubmittedFeaturization = {
  future: TaskFuture<ObjectRef>

  /** Key of `future`, stored on the record to correlate it with the computation. */
  taskId: string
}

/**
 * Schedules the featurization stages on the worker pool, each as tasks:
 *
 * 1. load every series and read its label
 * 2. featurize every series
 * 3. assemble one table from the feature vectors
 * 4. impute missing values
 * 5. save the table and labels as the artifact
 *
 * Returns as soon as everything is scheduled. A series that cannot be
 * featurized gets a row of missing values, which step 4 then fills.
 */
export class FeaturizationPipeline {
  private readonly logger: Logger

  constructor(
    private readonly deps: FeaturizationPipelineDeps,
    private readonly opts: FeaturizationPipelineOptions,
  ) {
    this.logger = deps.logger.child({ module: "featurization-pipeline" })
  }

  submit(request: FeaturizationRequest): SubmittedFeaturization {
    const { pool, storage, clock } = this.deps

    const series = pool.map(loadTimeSeries, request.files, storage)
    const labels = pool.map(extractLabel, series)
    const vectors = pool.map(featurizeTimeSeries, series, {
      features: request.features,
      raiseExceptions: false,
      logger: this.logger,
    })
    const table = pool.submit(assembleFeatureset, vectors, series)
    const imputed = pool.submit(imputeFeatureset, table, this.opts.impute)
    const future = pool.submit(saveFeatureset, imputed, labels, {
      storage,
      ref: request.artifact,
      clock,
    })

    this.logger.info("Featurization submitted", {
      taskId: future.key,
      files: request.files.length,
      features: request.features,
    })

    return { future, taskId: future.key }
  }
}
