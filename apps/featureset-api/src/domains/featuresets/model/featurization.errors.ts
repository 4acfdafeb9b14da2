import { BaseError } from "@featurekit/errors"

export type FeaturizationErrorCode =
  | "time_series_not_found"
  | "malformed_time_series"
  | "empty_time_series"
  | "insufficient_observations"
  | "unknown_feature"
  | "misaligned_featureset"

export class FeaturizationError extends BaseError<FeaturizationErrorCode> {
  static timeSeriesNotFound(name: string): FeaturizationError {
    return new FeaturizationError(`Time series file ${name} not found`, {
      code: "time_series_not_found",
      context: { name },
    })
  }

  static malformedRow(name: string, line: number, reason: string): FeaturizationError {
    return new FeaturizationError(`${name} line ${line}: ${reason}`, {
      code: "malformed_time_series",
      context: { name, line },
    })
  }

  static emptyTimeSeries(name: string): FeaturizationError {
    return new FeaturizationError(`${name} has no observations`, {
      code: "empty_time_series",
      context: { name },
    })
  }

  static insufficientObservations(
    name: string,
    feature: string,
    required: number,
  ): FeaturizationError {
    return new FeaturizationError(
      `${name}: ${feature} needs at least ${required} observation${required === 1 ? "" : "s"}`,
      {
        code: "insufficient_observations",
        context: { name, feature, required },
      },
    )
  }

  static unknownFeature(feature: string): FeaturizationError {
    return new FeaturizationError(`Unknown feature ${feature}`, {
      code: "unknown_feature",
      context: { feature },
      isOperational: false,
    })
  }

  static misaligned(features: number, series: number): FeaturizationError {
    return new FeaturizationError(
      `Got ${features} feature vectors for ${series} time series`,
      {
        code: "misaligned_featureset",
        context: { features, series },
        isOperational: false,
      },
    )
  }
}
