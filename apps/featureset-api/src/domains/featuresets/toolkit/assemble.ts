import type { FeatureTable, FeatureVector } from "../model/feature-table.model"
import { FeaturizationError } from "../model/featurization.errors"
import type { TimeSeries } from "./time-series"

/** One row per series, in series order. Columns follow the first vector's key order. */
export function assembleFeatureset(
  vectors: readonly FeatureVector[],
  series: readonly TimeSeries[],
): FeatureTable {
  if (vectors.length !== series.length) {
    throw FeaturizationError.misaligned(vectors.length, series.length)
  }

  const features = [...new Set(vectors.flatMap((vector) => Object.keys(vector)))]

  return {
    features,
    rows: series.map((s, i) => ({
      name: s.name,
      values: features.map((feature) => vectors[i]?.[feature] ?? null),
    })),
  }
}
