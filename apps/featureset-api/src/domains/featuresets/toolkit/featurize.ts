import type { Logger } from "@featurekit/logger"
import type { FeatureVector } from "../model/feature-table.model"
import { FeaturizationError } from "../model/featurization.errors"
import { featureDefinitions } from "./features"
import type { TimeSeries } from "./time-series"

export type FeaturizeOptions = {
  features: readonly string[]

  /**
   * When false, a series that cannot be featurized yields null for every
   * requested feature instead of failing the task.
   */
  raiseExceptions: boolean

  logger: Logger
}

/** Non-finite results are recorded as null. */
export function featurizeTimeSeries(
  series: TimeSeries,
  options: FeaturizeOptions,
): FeatureVector {
  try {
    return computeFeatures(series, options.features)
  } catch (err) {
    if (options.raiseExceptions) throw err

    options.logger.warn("Could not featurize time series, recording missing values", {
      series: series.name,
      err,
    })

    return Object.fromEntries(options.features.map((name) => [name, null]))
  }
}

function computeFeatures(series: TimeSeries, features: readonly string[]): FeatureVector {
  if (series.values.length === 0) throw FeaturizationError.emptyTimeSeries(series.name)

  const vector: FeatureVector = {}

  for (const name of features) {
    const definition = featureDefinitions[name]
    if (!definition) throw FeaturizationError.unknownFeature(name)

    if (series.values.length < definition.minObservations) {
      throw FeaturizationError.insufficientObservations(
        series.name,
        name,
        definition.minObservations,
      )
    }

    const value = definition.compute(series)
    vector[name] = Number.isFinite(value) ? value : null
  }

  return vector
}
